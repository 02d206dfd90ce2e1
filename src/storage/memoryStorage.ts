import { TelemetryConfiguration } from '../config/configuration';
import { TelemetryPing } from '../ping/pingBuilder';
import { PingProcessor, TelemetryStorage } from './storage';

/**
 * In-process storage. Keeps at most `maximumNumberOfPingsPerType` pings per
 * type; storing beyond that drops the oldest.
 */
export class MemoryTelemetryStorage implements TelemetryStorage {
  private readonly pings: Map<string, TelemetryPing[]> = new Map();
  private readonly maxPingsPerType: number;

  constructor(configuration: TelemetryConfiguration) {
    this.maxPingsPerType = configuration.getMaximumNumberOfPingsPerType();
  }

  store(ping: TelemetryPing): void {
    const stored = this.pings.get(ping.type) ?? [];
    stored.push(ping);
    if (stored.length > this.maxPingsPerType) {
      stored.splice(0, stored.length - this.maxPingsPerType);
    }
    this.pings.set(ping.type, stored);
  }

  countStoredPings(type: string): number {
    return this.pings.get(type)?.length ?? 0;
  }

  getStoredPings(type: string): TelemetryPing[] {
    return [...(this.pings.get(type) ?? [])];
  }

  getStoredTypes(): string[] {
    return Array.from(this.pings.keys()).filter(type => this.countStoredPings(type) > 0);
  }

  /**
   * Hands every stored ping of `type` to `processor`, oldest first, and removes
   * the ones it accepted. Stops at the first ping that is not accepted.
   *
   * @returns true if every ping was processed
   */
  async process(type: string, processor: PingProcessor): Promise<boolean> {
    const stored = this.pings.get(type) ?? [];

    while (stored.length > 0) {
      const [oldest] = stored;
      if (oldest === undefined || !(await processor(oldest))) {
        return false;
      }
      // The processor may have stored more pings meanwhile; drop by identity
      const index = stored.indexOf(oldest);
      if (index >= 0) {
        stored.splice(index, 1);
      }
    }

    return true;
  }
}
