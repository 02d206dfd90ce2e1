export {
  Telemetry,
  TelemetryRuntime,
  LifecycleState,
  defaultRuntime,
  initialize,
  get,
  record,
  shutdown,
} from './telemetry';
export type { TelemetryOptions } from './telemetry';

export { TelemetryConfiguration, DEFAULT_CONFIGURATION } from './config/configuration';
export type { TelemetryConfigurationOptions, ResolvedConfiguration } from './config/configuration';
export { ConfigurationLoader, defaultConfigurationLoader } from './config/loader';
export type { LoadOptions } from './config/loader';

export { TelemetryEvent } from './event/telemetryEvent';
export type { SerializedEvent, TelemetryEventOptions } from './event/telemetryEvent';
export { EventDecision, EventInterceptionChain } from './event/eventHandler';
export type { TelemetryEventHandler } from './event/eventHandler';

export { TelemetryMeasurement } from './measurement/measurement';
export { EventsMeasurement } from './measurement/eventsMeasurement';
export { SessionCountMeasurement } from './measurement/sessionCountMeasurement';
export { SessionDurationMeasurement } from './measurement/sessionDurationMeasurement';
export { SearchesMeasurement, SearchLocation } from './measurement/searchesMeasurement';
export { DefaultSearchMeasurement } from './measurement/defaultSearchMeasurement';
export type { DefaultSearchEngineProvider } from './measurement/defaultSearchMeasurement';

export { TelemetryPingBuilder } from './ping/pingBuilder';
export type { PingBuilder, PingBuilderOptions, TelemetryPing } from './ping/pingBuilder';
export { TelemetryCorePingBuilder } from './ping/corePingBuilder';
export { AbstractEventPingBuilder, TelemetryEventPingBuilder, isEventPingBuilder } from './ping/eventPingBuilder';
export type { EventPingBuilder } from './ping/eventPingBuilder';
export { TelemetryMobileEventPingBuilder } from './ping/mobileEventPingBuilder';
export { PingBuilderRegistry } from './ping/registry';

export { MemoryTelemetryStorage } from './storage/memoryStorage';
export type { TelemetryStorage, PingProcessor } from './storage/storage';
export type { TelemetryClient } from './net/client';
export type { TelemetryScheduler } from './schedule/scheduler';

export { TaskQueue } from './queue/taskQueue';
export type { QueueStats, TaskQueueOptions, TaskUnit, UnitErrorCallback } from './queue/taskQueue';

export {
  TelemetryError,
  LifecycleError,
  MissingPingBuilderError,
  ConfigError,
  ValidationError,
  isTelemetryError,
  isErrorOfType,
} from './errors/types';
export { ErrorHandler, createErrorHandler } from './errors/handler';

export { ConsoleLogger, NullLogger, createLogger, createChildLogger, logger } from './logger';
export type { Logger, LogLevel, LogEntry, TraceContext } from './logger';
