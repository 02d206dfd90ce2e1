import { TelemetryConfiguration } from '../../../src/config/configuration';
import { TelemetryPing } from '../../../src/ping/pingBuilder';
import { MemoryTelemetryStorage } from '../../../src/storage/memoryStorage';

function ping(type: string, documentId: string): TelemetryPing {
  return { type, documentId, uploadPath: `/submit/telemetry/${documentId}/${type}`, payload: {} };
}

describe('MemoryTelemetryStorage', () => {
  test('keeps pings per type', () => {
    const storage = new MemoryTelemetryStorage(new TelemetryConfiguration());
    storage.store(ping('core', 'c1'));
    storage.store(ping('mobile-event', 'e1'));
    storage.store(ping('core', 'c2'));

    expect(storage.countStoredPings('core')).toBe(2);
    expect(storage.countStoredPings('focus-event')).toBe(0);
    expect(storage.getStoredTypes()).toEqual(['core', 'mobile-event']);
    expect(storage.getStoredPings('core').map(p => p.documentId)).toEqual(['c1', 'c2']);
  });

  test('drops the oldest pings beyond the per-type limit', () => {
    const storage = new MemoryTelemetryStorage(new TelemetryConfiguration({ maximumNumberOfPingsPerType: 2 }));
    storage.store(ping('core', 'c1'));
    storage.store(ping('core', 'c2'));
    storage.store(ping('core', 'c3'));

    expect(storage.getStoredPings('core').map(p => p.documentId)).toEqual(['c2', 'c3']);
  });

  test('process removes accepted pings oldest first', async () => {
    const storage = new MemoryTelemetryStorage(new TelemetryConfiguration());
    storage.store(ping('core', 'c1'));
    storage.store(ping('core', 'c2'));
    const seen: string[] = [];

    const done = await storage.process('core', async p => {
      seen.push(p.documentId);
      return true;
    });

    expect(done).toBe(true);
    expect(seen).toEqual(['c1', 'c2']);
    expect(storage.countStoredPings('core')).toBe(0);
    expect(storage.getStoredTypes()).toEqual([]);
  });

  test('process stops at the first rejected ping and keeps it', async () => {
    const storage = new MemoryTelemetryStorage(new TelemetryConfiguration());
    storage.store(ping('core', 'c1'));
    storage.store(ping('core', 'c2'));
    storage.store(ping('core', 'c3'));

    const done = await storage.process('core', p => p.documentId !== 'c2');

    expect(done).toBe(false);
    expect(storage.getStoredPings('core').map(p => p.documentId)).toEqual(['c2', 'c3']);
  });

  test('processing an unknown type is complete immediately', async () => {
    const storage = new MemoryTelemetryStorage(new TelemetryConfiguration());
    await expect(storage.process('core', () => false)).resolves.toBe(true);
  });
});
