/**
 * Ping builder contract and shared base class.
 *
 * A builder owns an ordered list of measurements. Building a ping flushes every
 * measurement into the payload under its field name, so whatever a measurement
 * resets on flush is reset by `build()`.
 */

import { randomUUID } from 'crypto';
import { TelemetryConfiguration } from '../config/configuration';
import {
  Clock,
  CreatedDateMeasurement,
  SequenceMeasurement,
  StaticMeasurement,
  TelemetryMeasurement,
  TimezoneOffsetMeasurement,
  systemClock,
} from '../measurement/measurement';

/**
 * A built, storable telemetry payload
 */
export interface TelemetryPing {
  type: string;
  documentId: string;
  /** Server path the upload client submits this ping to */
  uploadPath: string;
  payload: Record<string, unknown>;
}

/**
 * The capability set the orchestrator relies on
 */
export interface PingBuilder {
  getType(): string;
  /** Pure readiness check */
  canBuild(): boolean;
  /** Only valid when `canBuild()` is true */
  build(): TelemetryPing;
}

export interface PingBuilderOptions {
  clock?: Clock;
}

export abstract class TelemetryPingBuilder implements PingBuilder {
  private readonly measurements: TelemetryMeasurement[] = [];
  protected readonly clock: Clock;

  protected constructor(
    protected readonly configuration: TelemetryConfiguration,
    private readonly type: string,
    version: number,
    options: PingBuilderOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.addMeasurement(new StaticMeasurement('v', version));
    this.addMeasurement(new SequenceMeasurement());
  }

  getType(): string {
    return this.type;
  }

  abstract canBuild(): boolean;

  build(): TelemetryPing {
    const documentId = randomUUID();
    const payload: Record<string, unknown> = {};

    for (const measurement of this.measurements) {
      payload[measurement.fieldName] = measurement.flush();
    }

    return {
      type: this.type,
      documentId,
      uploadPath: this.getUploadPath(documentId),
      payload,
    };
  }

  protected addMeasurement<M extends TelemetryMeasurement>(measurement: M): M {
    this.measurements.push(measurement);
    return measurement;
  }

  /** Adds the `created` and `tz` fields most pings carry */
  protected addTimeMeasurements(): void {
    this.addMeasurement(new CreatedDateMeasurement(this.clock));
    this.addMeasurement(new TimezoneOffsetMeasurement(this.clock));
  }

  protected getUploadPath(documentId: string): string {
    const { configuration } = this;
    return [
      '/submit/telemetry',
      documentId,
      this.type,
      configuration.getAppName(),
      configuration.getAppVersion(),
      configuration.getUpdateChannel(),
      configuration.getBuildId(),
    ].join('/');
  }
}
