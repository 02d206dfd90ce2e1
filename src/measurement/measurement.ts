/**
 * Source of the current time in milliseconds since the epoch
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * A stateful accumulator owned by a ping builder. `flush()` returns the value
 * written under `fieldName` in the ping payload and may reset the accumulator.
 */
export abstract class TelemetryMeasurement<T = unknown> {
  constructor(readonly fieldName: string) {}

  abstract flush(): T;
}

/**
 * A measurement that always reports the same value
 */
export class StaticMeasurement<T> extends TelemetryMeasurement<T> {
  constructor(fieldName: string, private readonly value: T) {
    super(fieldName);
  }

  flush(): T {
    return this.value;
  }
}

/**
 * Per-builder ping sequence number, starting at 0
 */
export class SequenceMeasurement extends TelemetryMeasurement<number> {
  private next = 0;

  constructor() {
    super('seq');
  }

  flush(): number {
    return this.next++;
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local creation date of the ping, formatted YYYY-MM-DD
 */
export class CreatedDateMeasurement extends TelemetryMeasurement<string> {
  constructor(private readonly clock: Clock = systemClock) {
    super('created');
  }

  flush(): string {
    const date = new Date(this.clock());
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  }
}

/**
 * Local timezone offset from UTC, in minutes
 */
export class TimezoneOffsetMeasurement extends TelemetryMeasurement<number> {
  constructor(private readonly clock: Clock = systemClock) {
    super('tz');
  }

  flush(): number {
    return -new Date(this.clock()).getTimezoneOffset();
  }
}
