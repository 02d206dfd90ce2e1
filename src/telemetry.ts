/**
 * Telemetry orchestrator.
 *
 * Application code talks to a {@link Telemetry} handle obtained from a
 * {@link TelemetryRuntime}. Guard checks (lifecycle, collection and upload
 * flags, required builders) run synchronously on the caller's stack; anything
 * that touches builder state, storage or the scheduler is submitted to the
 * handle's single {@link TaskQueue} and runs there in submission order.
 */

import { TelemetryConfiguration } from './config/configuration';
import { ErrorHandler } from './errors/handler';
import { LifecycleError, MissingPingBuilderError } from './errors/types';
import { EventInterceptionChain, TelemetryEventHandler } from './event/eventHandler';
import { TelemetryEvent } from './event/telemetryEvent';
import { Logger, createChildLogger, logger as defaultLogger } from './logger';
import { DefaultSearchEngineProvider } from './measurement/defaultSearchMeasurement';
import { TelemetryClient } from './net/client';
import { TelemetryCorePingBuilder, isCorePingBuilder } from './ping/corePingBuilder';
import { EventPingBuilder, TelemetryEventPingBuilder, isEventPingBuilder } from './ping/eventPingBuilder';
import { TelemetryMobileEventPingBuilder } from './ping/mobileEventPingBuilder';
import { PingBuilder } from './ping/pingBuilder';
import { PingBuilderRegistry } from './ping/registry';
import { QueueStats, TaskQueue, UnitErrorCallback } from './queue/taskQueue';
import { TelemetryScheduler } from './schedule/scheduler';
import { TelemetryStorage } from './storage/storage';

export interface TelemetryOptions {
  configuration: TelemetryConfiguration;
  storage: TelemetryStorage;
  client: TelemetryClient;
  scheduler: TelemetryScheduler;
  /** Sees every recorded event first and may suppress default handling */
  eventHandler?: TelemetryEventHandler;
  logger?: Logger;
  /** Called for every failure inside the worker or the event handler */
  onError?: UnitErrorCallback;
}

/** Event builder types, in lookup order */
const EVENT_PING_TYPES = [TelemetryMobileEventPingBuilder.TYPE, TelemetryEventPingBuilder.TYPE];

interface HeldResources {
  configuration: TelemetryConfiguration;
  storage: TelemetryStorage;
  client: TelemetryClient;
  scheduler: TelemetryScheduler;
  registry: PingBuilderRegistry;
  queue: TaskQueue;
  chain: EventInterceptionChain;
}

/**
 * Handle to an initialized telemetry instance. Obtain one through
 * {@link TelemetryRuntime.initialize}; after shutdown every public method
 * throws {@link LifecycleError}.
 */
export class Telemetry {
  private resources: HeldResources | undefined;
  private closed = false;
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly onError: UnitErrorCallback | undefined;

  constructor(options: TelemetryOptions) {
    this.logger = options.logger ?? createChildLogger(defaultLogger, 'telemetry');
    this.errorHandler = new ErrorHandler({ logger: this.logger });
    this.onError = options.onError;

    const queue = new TaskQueue({
      logger: this.logger,
      errorHandler: this.errorHandler,
      timeout: options.configuration.getTaskTimeout(),
      ...(options.onError ? { onError: options.onError } : {}),
    });

    this.resources = {
      configuration: options.configuration,
      storage: options.storage,
      client: options.client,
      scheduler: options.scheduler,
      registry: new PingBuilderRegistry(),
      queue,
      chain: new EventInterceptionChain(
        event => this.queueEvent(event),
        options.eventHandler,
        (error, event) => this.report(error, 'eventHandler', { event: event.toJSON() })
      ),
    };
  }

  addPingBuilder(builder: PingBuilder): this {
    this.requireOpen().registry.register(builder);
    return this;
  }

  getBuilders(): PingBuilder[] {
    return this.requireOpen().registry.getAll();
  }

  /**
   * Build and store a ping of `type` if its builder is ready
   */
  queuePing(type: string): this {
    const resources = this.requireOpen();
    if (!resources.configuration.isCollectionEnabled()) {
      return this;
    }

    this.submitPingBuild(resources, type);
    return this;
  }

  scheduleUpload(): this {
    const { configuration, queue, scheduler } = this.requireOpen();
    if (!configuration.isUploadEnabled()) {
      return this;
    }

    queue.submit('scheduleUpload', async () => {
      await scheduler.scheduleUpload(configuration);
    });
    return this;
  }

  recordSessionStart(): this {
    const resources = this.requireOpen();
    if (!resources.configuration.isCollectionEnabled()) {
      return this;
    }

    const builder = this.requireCoreBuilder(resources);
    resources.queue.submit('recordSessionStart', () => {
      if (!builder.getSessionDurationMeasurement().recordSessionStart()) {
        this.logger.warn('Session start recorded while a session is already running; ignoring');
        return;
      }
      builder.getSessionCountMeasurement().countSession();
    });
    return this;
  }

  recordSessionEnd(): this {
    const resources = this.requireOpen();
    if (!resources.configuration.isCollectionEnabled()) {
      return this;
    }

    const builder = this.requireCoreBuilder(resources);
    resources.queue.submit('recordSessionEnd', () => {
      if (!builder.getSessionDurationMeasurement().recordSessionEnd()) {
        this.logger.warn('Session end recorded without a running session; ignoring');
      }
    });
    return this;
  }

  /**
   * Record a search for the given location and search engine identifier.
   *
   * Common locations are listed in `SearchLocation`: "actionbar" when the user
   * typed in the URL bar and used the default engine, "listitem" when they
   * picked a secondary engine, "suggestion" for a search suggestion.
   */
  recordSearch(location: string, identifier: string): this {
    const resources = this.requireOpen();
    if (!resources.configuration.isCollectionEnabled()) {
      return this;
    }

    const builder = this.requireCoreBuilder(resources);
    resources.queue.submit('recordSearch', () => {
      builder.getSearchesMeasurement().recordSearch(location, identifier);
    });
    return this;
  }

  setDefaultSearchProvider(provider: DefaultSearchEngineProvider): this {
    const resources = this.requireOpen();
    const builder = this.requireCoreBuilder(resources);
    resources.queue.submit('setDefaultSearchProvider', () => {
      builder.getDefaultSearchMeasurement().setDefaultSearchEngineProvider(provider);
    });
    return this;
  }

  getClient(): TelemetryClient {
    return this.requireOpen().client;
  }

  getStorage(): TelemetryStorage {
    return this.requireOpen().storage;
  }

  getConfiguration(): TelemetryConfiguration {
    return this.requireOpen().configuration;
  }

  getQueueStats(): QueueStats {
    return this.requireOpen().queue.getStats();
  }

  /**
   * Resolves once all submitted work has run. Production code has no need
   * for it; tests and shutdown paths do.
   */
  async flush(): Promise<void> {
    await this.requireOpen().queue.drain();
  }

  /** @internal entry point for {@link TelemetryRuntime.record} */
  record(event: TelemetryEvent): void {
    if (this.closed || !this.resources) {
      return;
    }
    event.seal();
    this.resources.chain.handle(event);
  }

  /**
   * @internal Refuse public calls, drain the queue, then drop every reference
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const resources = this.resources;
    if (!resources) {
      return;
    }
    await resources.queue.close();
    resources.registry.clear();
    this.resources = undefined;
  }

  private queueEvent(event: TelemetryEvent): void {
    const resources = this.requireOpen();
    if (!resources.configuration.isCollectionEnabled()) {
      return;
    }

    resources.queue.submit('queueEvent', () => this.batchEvent(resources, event));
  }

  private batchEvent(resources: HeldResources, event: TelemetryEvent): void {
    const builder = this.resolveEventBuilder(resources.registry);
    const measurement = builder.getEventsMeasurement();

    measurement.add(event);
    if (measurement.getEventCount() >= resources.configuration.getMaximumNumberOfEventsPerPing()) {
      // Collection was checked before batching started and the configuration is immutable
      this.submitPingBuild(resources, builder.getType());
    }
  }

  private submitPingBuild(resources: HeldResources, type: string): void {
    const { queue, registry, storage } = resources;

    queue.submit(`queuePing:${type}`, async () => {
      const builder = registry.get(type);
      if (!builder) {
        throw new MissingPingBuilderError(`No ping builder registered for type '${type}'`, [type]);
      }

      // Not enough data yet
      if (!builder.canBuild()) {
        return;
      }

      const ping = builder.build();
      await storage.store(ping);
    });
  }

  private resolveEventBuilder(registry: PingBuilderRegistry): EventPingBuilder {
    for (const type of EVENT_PING_TYPES) {
      const builder = registry.get(type);
      if (!builder) {
        continue;
      }
      if (!isEventPingBuilder(builder)) {
        throw new MissingPingBuilderError(
          `The ping builder registered for '${type}' does not collect events`,
          [type]
        );
      }
      return builder;
    }

    throw new MissingPingBuilderError(
      `Expected a '${TelemetryMobileEventPingBuilder.TYPE}' or '${TelemetryEventPingBuilder.TYPE}' ping builder to queue events`,
      EVENT_PING_TYPES
    );
  }

  private requireCoreBuilder(resources: HeldResources): TelemetryCorePingBuilder {
    const builder = resources.registry.get(TelemetryCorePingBuilder.TYPE);
    if (!builder || !isCorePingBuilder(builder)) {
      throw new MissingPingBuilderError(
        'This configuration does not contain a core ping builder',
        [TelemetryCorePingBuilder.TYPE]
      );
    }
    return builder;
  }

  private requireOpen(): HeldResources {
    if (this.closed || !this.resources) {
      throw new LifecycleError('Telemetry instance has been shut down', 'NOT_INITIALIZED');
    }
    return this.resources;
  }

  private report(error: unknown, source: string, context: Record<string, unknown>): void {
    const normalized = this.errorHandler.handle(error, { source, ...context });
    if (!this.onError) {
      return;
    }
    try {
      this.onError(normalized, source);
    } catch (callbackError) {
      this.logger.warn(`onError callback threw while reporting '${source}'`, callbackError);
    }
  }
}

export enum LifecycleState {
  Uninitialized = 'uninitialized',
  Initialized = 'initialized',
}

type RuntimeSlot =
  | { state: LifecycleState.Uninitialized }
  | { state: LifecycleState.Initialized; telemetry: Telemetry };

/**
 * Holds at most one initialized {@link Telemetry} at a time and enforces the
 * `Uninitialized -> Initialized -> Uninitialized` lifecycle.
 */
export class TelemetryRuntime {
  private slot: RuntimeSlot = { state: LifecycleState.Uninitialized };

  /**
   * @throws LifecycleError if already initialized
   */
  initialize(options: TelemetryOptions): Telemetry {
    if (this.slot.state === LifecycleState.Initialized) {
      throw new LifecycleError('Telemetry can only be initialized once', 'ALREADY_INITIALIZED');
    }

    const telemetry = new Telemetry(options);
    this.slot = { state: LifecycleState.Initialized, telemetry };
    return telemetry;
  }

  /**
   * @throws LifecycleError if not initialized
   */
  get(): Telemetry {
    if (this.slot.state !== LifecycleState.Initialized) {
      throw new LifecycleError('Telemetry not initialized', 'NOT_INITIALIZED');
    }
    return this.slot.telemetry;
  }

  getState(): LifecycleState {
    return this.slot.state;
  }

  /**
   * Route an event through the interception chain. Dropped silently when
   * not initialized.
   */
  record(event: TelemetryEvent): void {
    if (this.slot.state === LifecycleState.Initialized) {
      this.slot.telemetry.record(event);
    }
  }

  /**
   * Return to `Uninitialized` right away, then wait for the old instance to
   * finish its queued work. Initializing again does not have to wait.
   */
  async shutdown(): Promise<void> {
    if (this.slot.state !== LifecycleState.Initialized) {
      return;
    }

    const { telemetry } = this.slot;
    this.slot = { state: LifecycleState.Uninitialized };
    await telemetry.close();
  }
}

/**
 * Process-wide runtime behind the module-level helpers
 */
export const defaultRuntime = new TelemetryRuntime();

export function initialize(options: TelemetryOptions): Telemetry {
  return defaultRuntime.initialize(options);
}

export function get(): Telemetry {
  return defaultRuntime.get();
}

export function record(event: TelemetryEvent): void {
  defaultRuntime.record(event);
}

export function shutdown(): Promise<void> {
  return defaultRuntime.shutdown();
}
