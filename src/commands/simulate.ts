/**
 * simulate command: drive the whole pipeline against in-memory collaborators
 * and report what was stored and uploaded.
 */

import { ConfigurationLoader, defaultConfigurationLoader } from '../config/loader';
import { TelemetryEvent } from '../event/telemetryEvent';
import { Logger, NullLogger } from '../logger';
import { TelemetryClient } from '../net/client';
import { TelemetryCorePingBuilder } from '../ping/corePingBuilder';
import { TelemetryMobileEventPingBuilder } from '../ping/mobileEventPingBuilder';
import { TelemetryScheduler } from '../schedule/scheduler';
import { MemoryTelemetryStorage } from '../storage/memoryStorage';
import { TelemetryRuntime } from '../telemetry';
import { ui } from '../utils/ui';

export interface SimulateCommandOptions {
  events?: number;
  config?: string;
  json?: boolean;
  env?: NodeJS.ProcessEnv;
  loader?: ConfigurationLoader;
  logger?: Logger;
}

export interface SimulationSummary {
  events: number;
  /** Pings stored per type, before upload */
  stored: Record<string, number>;
  /** Upload paths the dry-run client received */
  uploaded: string[];
  /** Worker units that failed */
  failures: number;
}

const DEFAULT_EVENT_COUNT = 10;

export async function runSimulation(options: SimulateCommandOptions = {}): Promise<SimulationSummary> {
  const events = options.events ?? DEFAULT_EVENT_COUNT;
  const loader = options.loader ?? defaultConfigurationLoader;
  const configuration = loader.load({
    ...(options.config !== undefined ? { filePath: options.config } : {}),
    ...(options.env !== undefined ? { env: options.env } : {}),
  });

  const storage = new MemoryTelemetryStorage(configuration);
  const uploaded: string[] = [];
  const client: TelemetryClient = {
    uploadPing: async (_configuration, path) => {
      uploaded.push(path);
      return true;
    },
  };
  const scheduler: TelemetryScheduler = {
    scheduleUpload: async (config) => {
      for (const type of storage.getStoredTypes()) {
        await storage.process(type, ping => client.uploadPing(config, ping.uploadPath, JSON.stringify(ping.payload)));
      }
    },
  };

  let failures = 0;
  const runtime = new TelemetryRuntime();
  const telemetry = runtime.initialize({
    configuration,
    storage,
    client,
    scheduler,
    logger: options.logger ?? new NullLogger(),
    onError: () => {
      failures++;
    },
  });

  telemetry
    .addPingBuilder(new TelemetryCorePingBuilder(configuration))
    .addPingBuilder(new TelemetryMobileEventPingBuilder(configuration));

  telemetry.recordSessionStart();
  for (let i = 0; i < events; i++) {
    runtime.record(TelemetryEvent.create('action', 'click', 'simulated', String(i)));
  }
  telemetry
    .recordSessionEnd()
    .queuePing(TelemetryCorePingBuilder.TYPE)
    .queuePing(TelemetryMobileEventPingBuilder.TYPE);
  await telemetry.flush();

  const stored: Record<string, number> = {};
  for (const type of storage.getStoredTypes()) {
    stored[type] = storage.countStoredPings(type);
  }

  telemetry.scheduleUpload();
  await runtime.shutdown();

  return { events, stored, uploaded, failures };
}

export async function executeSimulateCommand(options: SimulateCommandOptions = {}): Promise<SimulationSummary> {
  const summary = await runSimulation(options);

  if (options.json) {
    ui.info(JSON.stringify(summary, null, 2));
    return summary;
  }

  ui.info(`Recorded ${summary.events} events`);
  for (const [type, count] of Object.entries(summary.stored)) {
    ui.info(`  ${type}: ${count} ping(s) stored`);
  }
  ui.info(`Uploaded ${summary.uploaded.length} ping(s)`);
  if (summary.failures > 0) {
    ui.warn(`${summary.failures} worker unit(s) failed`);
  }
  return summary;
}
