import { TelemetryConfiguration } from '../config/configuration';

/**
 * Uploads serialized pings. The orchestrator only holds a reference and
 * exposes it to schedulers through `Telemetry.getClient()`.
 */
export interface TelemetryClient {
  /**
   * @returns true when the server accepted the ping (or rejected it for good),
   * false when the upload should be retried later
   */
  uploadPing(configuration: TelemetryConfiguration, path: string, serializedPing: string): Promise<boolean>;
}
