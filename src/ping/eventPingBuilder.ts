import { TelemetryConfiguration } from '../config/configuration';
import { EventsMeasurement } from '../measurement/eventsMeasurement';
import { PingBuilder, PingBuilderOptions, TelemetryPingBuilder } from './pingBuilder';

/**
 * A builder that accumulates recorded events
 */
export interface EventPingBuilder extends PingBuilder {
  getEventsMeasurement(): EventsMeasurement;
}

export function isEventPingBuilder(builder: PingBuilder): builder is EventPingBuilder {
  return builder instanceof AbstractEventPingBuilder;
}

/**
 * Shared base for event pings. Ready once at least
 * `minimumEventsForUpload` events have been collected.
 */
export abstract class AbstractEventPingBuilder extends TelemetryPingBuilder implements EventPingBuilder {
  private readonly eventsMeasurement: EventsMeasurement;

  protected constructor(
    configuration: TelemetryConfiguration,
    type: string,
    version: number,
    options: PingBuilderOptions = {}
  ) {
    super(configuration, type, version, options);
    this.addTimeMeasurements();
    this.eventsMeasurement = this.addMeasurement(new EventsMeasurement());
  }

  getEventsMeasurement(): EventsMeasurement {
    return this.eventsMeasurement;
  }

  canBuild(): boolean {
    return this.eventsMeasurement.getEventCount() >= this.configuration.getMinimumEventsForUpload();
  }
}

/**
 * Legacy event ping, kept for applications that still register it
 */
export class TelemetryEventPingBuilder extends AbstractEventPingBuilder {
  static readonly TYPE = 'focus-event';
  private static readonly VERSION = 1;

  constructor(configuration: TelemetryConfiguration, options: PingBuilderOptions = {}) {
    super(configuration, TelemetryEventPingBuilder.TYPE, TelemetryEventPingBuilder.VERSION, options);
  }
}
