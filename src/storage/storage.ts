import { TelemetryPing } from '../ping/pingBuilder';

/**
 * Durable home for built pings. Failures propagate to the caller; the
 * orchestrator reports them and moves on.
 */
export interface TelemetryStorage {
  store(ping: TelemetryPing): void | Promise<void>;
}

/**
 * Called for each stored ping while processing. Resolve `true` once the ping
 * has been handled (e.g. uploaded) and may be removed.
 */
export type PingProcessor = (ping: TelemetryPing) => boolean | Promise<boolean>;
