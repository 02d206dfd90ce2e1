import { executeSimulateCommand, runSimulation } from '../../../src/commands/simulate';
import { ConfigurationLoader } from '../../../src/config/loader';
import { NullLogger } from '../../../src/logger';

describe('simulate command', () => {
  const loader = new ConfigurationLoader(new NullLogger());

  test('stores one core and one event ping and uploads both', async () => {
    const summary = await runSimulation({ env: {}, loader });

    expect(summary.events).toBe(10);
    expect(summary.stored).toEqual({ core: 1, 'mobile-event': 1 });
    expect(summary.uploaded).toHaveLength(2);
    expect(summary.uploaded[0]).toMatch(/^\/submit\/telemetry\/[0-9a-f-]{36}\/core\/unknown\/unknown\/unknown\/unknown$/);
    expect(summary.uploaded[1]).toMatch(/\/mobile-event\//);
    expect(summary.failures).toBe(0);
  });

  test('batches every event into a single ping when promotions outrun the explicit queue', async () => {
    const summary = await runSimulation({
      events: 5,
      env: { TELEMETRY_MAX_EVENTS_PER_PING: '2' },
      loader,
    });

    expect(summary.stored).toEqual({ core: 1, 'mobile-event': 1 });
    expect(summary.failures).toBe(0);
  });

  test('too few events leave the event ping unbuilt', async () => {
    const summary = await runSimulation({ events: 2, env: {}, loader });

    expect(summary.stored).toEqual({ core: 1 });
    expect(summary.uploaded).toHaveLength(1);
  });

  test('with upload disabled nothing is uploaded', async () => {
    const summary = await runSimulation({ env: { TELEMETRY_UPLOAD_ENABLED: '0' }, loader });

    expect(summary.stored).toEqual({ core: 1, 'mobile-event': 1 });
    expect(summary.uploaded).toEqual([]);
  });

  test('with collection disabled nothing is stored', async () => {
    const summary = await runSimulation({ env: { TELEMETRY_COLLECTION_ENABLED: 'false' }, loader });

    expect(summary.stored).toEqual({});
    expect(summary.uploaded).toEqual([]);
    expect(summary.failures).toBe(0);
  });

  test('prints the summary as JSON', async () => {
    const output: string[] = [];
    const write = jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      output.push(String(chunk));
      return true;
    });

    try {
      const summary = await executeSimulateCommand({ events: 3, json: true, env: {}, loader });
      expect(output).toEqual([JSON.stringify(summary, null, 2) + '\n']);
    } finally {
      write.mockRestore();
    }
  });
});
