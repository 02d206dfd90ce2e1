/**
 * Telemetry configuration.
 *
 * A configuration is built once per session and never changes afterwards; every
 * orchestrator operation reads its flags and thresholds.
 */

import { ValidationError } from '../errors/types';

/**
 * Settings accepted when building a configuration. Every field is optional and
 * falls back to {@link DEFAULT_CONFIGURATION}.
 */
export interface TelemetryConfigurationOptions {
  /** Name of the application sending telemetry */
  appName?: string;

  /** Version of the application sending telemetry */
  appVersion?: string;

  /** Release channel, e.g. "release" or "beta" */
  updateChannel?: string;

  /** Build identifier of the application */
  buildId?: string;

  /** Base URL the upload client submits pings to */
  serverEndpoint?: string;

  /** User agent the upload client sends */
  userAgent?: string;

  /** Whether events and measurements are collected at all */
  collectionEnabled?: boolean;

  /** Whether stored pings may be uploaded */
  uploadEnabled?: boolean;

  /** Events an event ping needs before it can be built */
  minimumEventsForUpload?: number;

  /** Event count that promotes accumulated events into a ping */
  maximumNumberOfEventsPerPing?: number;

  /** Stored pings kept per ping type before the oldest are dropped */
  maximumNumberOfPingsPerType?: number;

  /** Upload budget per day, enforced by the scheduler */
  maximumNumberOfPingUploadsPerDay?: number;

  /** Initial upload backoff in milliseconds, used by the scheduler */
  initialBackoffForUpload?: number;

  /** Connect timeout for the upload client in milliseconds */
  connectTimeout?: number;

  /** Read timeout for the upload client in milliseconds */
  readTimeout?: number;

  /** Upper bound for a single worker unit in milliseconds */
  taskTimeout?: number;
}

export type ResolvedConfiguration = Readonly<Required<TelemetryConfigurationOptions>>;

export const DEFAULT_CONFIGURATION: ResolvedConfiguration = Object.freeze({
  appName: 'unknown',
  appVersion: 'unknown',
  updateChannel: 'unknown',
  buildId: 'unknown',
  serverEndpoint: 'https://telemetry.invalid',
  userAgent: 'telemetry-orchestrator/1.0',
  collectionEnabled: true,
  uploadEnabled: true,
  minimumEventsForUpload: 3,
  maximumNumberOfEventsPerPing: 500,
  maximumNumberOfPingsPerType: 40,
  maximumNumberOfPingUploadsPerDay: 100,
  initialBackoffForUpload: 30000,
  connectTimeout: 10000,
  readTimeout: 30000,
  taskTimeout: 30000,
});

type NumericField = {
  [K in keyof ResolvedConfiguration]: ResolvedConfiguration[K] extends number ? K : never;
}[keyof ResolvedConfiguration];

const POSITIVE_INTEGER_FIELDS: NumericField[] = [
  'minimumEventsForUpload',
  'maximumNumberOfEventsPerPing',
  'maximumNumberOfPingsPerType',
  'maximumNumberOfPingUploadsPerDay',
  'initialBackoffForUpload',
  'connectTimeout',
  'readTimeout',
  'taskTimeout',
];

export class TelemetryConfiguration {
  private readonly settings: ResolvedConfiguration;

  /**
   * @throws ValidationError when a numeric setting is not a positive integer
   */
  constructor(options: TelemetryConfigurationOptions = {}) {
    const settings: Required<TelemetryConfigurationOptions> = { ...DEFAULT_CONFIGURATION };
    for (const [key, value] of Object.entries(options)) {
      if (value !== undefined && key in settings) {
        Object.assign(settings, { [key]: value });
      }
    }

    for (const field of POSITIVE_INTEGER_FIELDS) {
      const value = settings[field];
      if (!Number.isInteger(value) || value < 1) {
        throw new ValidationError(`${field} must be a positive integer`, field, value);
      }
    }

    this.settings = Object.freeze(settings);
  }

  isCollectionEnabled(): boolean {
    return this.settings.collectionEnabled;
  }

  isUploadEnabled(): boolean {
    return this.settings.uploadEnabled;
  }

  getMaximumNumberOfEventsPerPing(): number {
    return this.settings.maximumNumberOfEventsPerPing;
  }

  getMinimumEventsForUpload(): number {
    return this.settings.minimumEventsForUpload;
  }

  getMaximumNumberOfPingsPerType(): number {
    return this.settings.maximumNumberOfPingsPerType;
  }

  getTaskTimeout(): number {
    return this.settings.taskTimeout;
  }

  getAppName(): string {
    return this.settings.appName;
  }

  getAppVersion(): string {
    return this.settings.appVersion;
  }

  getUpdateChannel(): string {
    return this.settings.updateChannel;
  }

  getBuildId(): string {
    return this.settings.buildId;
  }

  /**
   * All settings, defaults applied
   */
  toJSON(): ResolvedConfiguration {
    return this.settings;
  }
}
