import { Clock, TelemetryMeasurement, systemClock } from './measurement';

/**
 * Sums the length of finished sessions in whole seconds. Each session is
 * truncated to whole seconds before it is added.
 */
export class SessionDurationMeasurement extends TelemetryMeasurement<number> {
  private sessionStart: number | undefined;
  private totalSeconds = 0;

  constructor(private readonly clock: Clock = systemClock) {
    super('durations');
  }

  /**
   * @returns false if a session is already running
   */
  recordSessionStart(): boolean {
    if (this.sessionStart !== undefined) {
      return false;
    }
    this.sessionStart = this.clock();
    return true;
  }

  /**
   * @returns false if no session was running
   */
  recordSessionEnd(): boolean {
    if (this.sessionStart === undefined) {
      return false;
    }
    const elapsed = Math.max(0, this.clock() - this.sessionStart);
    this.totalSeconds += Math.floor(elapsed / 1000);
    this.sessionStart = undefined;
    return true;
  }

  isSessionRunning(): boolean {
    return this.sessionStart !== undefined;
  }

  flush(): number {
    const total = this.totalSeconds;
    this.totalSeconds = 0;
    return total;
  }
}
