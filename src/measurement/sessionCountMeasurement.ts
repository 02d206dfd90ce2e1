import { TelemetryMeasurement } from './measurement';

export class SessionCountMeasurement extends TelemetryMeasurement<number> {
  private count = 0;

  constructor() {
    super('sessions');
  }

  countSession(): void {
    this.count++;
  }

  flush(): number {
    const sessions = this.count;
    this.count = 0;
    return sessions;
  }
}
