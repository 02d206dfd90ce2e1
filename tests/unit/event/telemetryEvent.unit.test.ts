import { ValidationError } from '../../../src/errors/types';
import { TelemetryEvent } from '../../../src/event/telemetryEvent';

describe('TelemetryEvent', () => {
  test('serializes the four mandatory fields', () => {
    const event = new TelemetryEvent('action', 'click', 'button', { timestamp: 1234 });
    expect(event.toJSON()).toEqual([1234, 'action', 'click', 'button']);
  });

  test('appends the value when present', () => {
    const event = new TelemetryEvent('action', 'type', 'url', { value: 'search', timestamp: 1 });
    expect(event.toJSON()).toEqual([1, 'action', 'type', 'url', 'search']);
  });

  test('writes a null value placeholder before extras', () => {
    const event = new TelemetryEvent('action', 'open', 'tab', { timestamp: 1 })
      .extra('source', 'menu')
      .extra('count', '2');

    expect(event.toJSON()).toEqual([1, 'action', 'open', 'tab', null, { source: 'menu', count: '2' }]);
  });

  test('create() builds an event stamped with the current time', () => {
    const before = Date.now();
    const event = TelemetryEvent.create('action', 'click', 'simulated', '3');
    const after = Date.now();

    expect(event.value).toBe('3');
    expect(event.timestamp).toBeGreaterThanOrEqual(before);
    expect(event.timestamp).toBeLessThanOrEqual(after);
  });

  test('extras passed as options are kept', () => {
    const event = new TelemetryEvent('action', 'click', 'button', { extras: { a: '1' } });
    expect(event.getExtras()).toEqual({ a: '1' });
  });

  test('setting an extra twice keeps the last value', () => {
    const event = TelemetryEvent.create('action', 'click', 'button').extra('a', '1').extra('a', '2');
    expect(event.getExtras()).toEqual({ a: '2' });
  });

  test.each([
    ['category', 'c'.repeat(31), 'click', 'button', 'category must be between 1 and 30 characters'],
    ['method', 'action', 'm'.repeat(21), 'button', 'method must be between 1 and 20 characters'],
    ['object', 'action', 'click', 'o'.repeat(21), 'object must be between 1 and 20 characters'],
    ['empty category', '', 'click', 'button', 'category must be between 1 and 30 characters'],
  ])('rejects an invalid %s', (_label, category, method, object, message) => {
    expect(() => TelemetryEvent.create(category, method, object)).toThrow(ValidationError);
    expect(() => TelemetryEvent.create(category, method, object)).toThrow(message);
  });

  test('rejects a value longer than 80 characters', () => {
    expect(() => TelemetryEvent.create('action', 'click', 'button', 'v'.repeat(81)))
      .toThrow('value must be between 1 and 80 characters');
  });

  test('accepts values at the length limits', () => {
    expect(() => TelemetryEvent.create('c'.repeat(30), 'm'.repeat(20), 'o'.repeat(20), 'v'.repeat(80)))
      .not.toThrow();
  });

  test('rejects an eleventh extra', () => {
    const event = TelemetryEvent.create('action', 'click', 'button');
    for (let i = 0; i < 10; i++) {
      event.extra(`key${i}`, 'x');
    }

    expect(() => event.extra('key10', 'x')).toThrow('An event can carry at most 10 extras');
    expect(() => event.extra('key0', 'y')).not.toThrow();
  });

  test('rejects an extra key longer than 15 characters', () => {
    expect(() => TelemetryEvent.create('action', 'click', 'button').extra('k'.repeat(16), 'x'))
      .toThrow('extra key must be between 1 and 15 characters');
  });

  test('a sealed event refuses new extras', () => {
    const event = TelemetryEvent.create('action', 'click', 'button').extra('source', 'menu');
    expect(event.isSealed()).toBe(false);

    event.seal();

    expect(event.isSealed()).toBe(true);
    expect(() => event.extra('late', 'x')).toThrow('Extras cannot change once an event has been recorded');
    expect(event.toJSON().slice(5)).toEqual([{ source: 'menu' }]);
  });
});
