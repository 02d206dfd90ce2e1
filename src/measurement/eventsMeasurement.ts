import { TelemetryMeasurement } from './measurement';
import { SerializedEvent, TelemetryEvent } from '../event/telemetryEvent';

/**
 * Accumulates events for an event ping, serialized as they arrive. Flushing
 * hands back every event in recording order and empties the measurement.
 */
export class EventsMeasurement extends TelemetryMeasurement<SerializedEvent[]> {
  private events: SerializedEvent[] = [];

  constructor() {
    super('events');
  }

  add(event: TelemetryEvent): void {
    this.events.push(event.toJSON());
  }

  getEventCount(): number {
    return this.events.length;
  }

  flush(): SerializedEvent[] {
    const flushed = this.events;
    this.events = [];
    return flushed;
  }
}
