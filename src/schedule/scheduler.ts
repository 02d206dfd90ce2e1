import { TelemetryConfiguration } from '../config/configuration';

/**
 * Decides when stored pings get uploaded. The scheduler discovers what to
 * upload on its own; retries and backoff are its concern.
 */
export interface TelemetryScheduler {
  scheduleUpload(configuration: TelemetryConfiguration): void | Promise<void>;
}
