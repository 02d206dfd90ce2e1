/**
 * Task Queue
 *
 * The single execution lane of a telemetry instance. Units run one at a time,
 * strictly in submission order, on a p-queue with concurrency 1.
 *
 * - Fire-and-forget: `submit` never hands back a result
 * - Units never start on the submitter's synchronous stack
 * - A failing unit is reported and the lane keeps going
 * - A unit that overruns its timeout is reported but keeps the lane until it settles
 * - `close()` drains everything already submitted (including units those
 *   units submit) before refusing new work
 */

import PQueue from 'p-queue';
import { ErrorHandler } from '../errors/handler';
import { LifecycleError, TelemetryError } from '../errors/types';
import { Logger, NullLogger } from '../logger';

export type TaskUnit = () => void | Promise<void>;

export type UnitErrorCallback = (error: TelemetryError, unitName: string) => void;

export interface TaskQueueOptions {
  /** Logger for unit traces and failures */
  logger?: Logger;
  /** Normalizes unit failures. Default: a handler logging to `logger` */
  errorHandler?: ErrorHandler;
  /** Observability hook for unit failures */
  onError?: UnitErrorCallback;
  /** Report units still running after this many ms (default: never) */
  timeout?: number;
}

/**
 * Queue statistics
 */
export interface QueueStats {
  /** Units ever accepted */
  submitted: number;
  /** Units that finished without error */
  completed: number;
  /** Units that threw or rejected */
  failed: number;
  /** Units that overran the timeout; each is also counted as completed or failed */
  timedOut: number;
  /** Units waiting or running */
  pending: number;
}

export class TaskQueue {
  private readonly queue: PQueue;
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly onError: UnitErrorCallback | undefined;
  private readonly timeout: number | undefined;
  private stats = { submitted: 0, completed: 0, failed: 0, timedOut: 0 };
  private closed = false;

  constructor(options: TaskQueueOptions = {}) {
    this.logger = options.logger ?? new NullLogger();
    this.errorHandler = options.errorHandler ?? new ErrorHandler({ logger: this.logger });
    this.onError = options.onError;
    this.timeout = options.timeout;

    this.queue = new PQueue({ concurrency: 1 });
  }

  /**
   * Queue a unit behind everything submitted so far.
   * @throws LifecycleError once the queue is closed
   */
  submit(name: string, unit: TaskUnit): void {
    if (this.closed) {
      throw new LifecycleError(`Cannot submit '${name}': the task queue has been shut down`, 'NOT_INITIALIZED', {
        details: { unit: name },
      });
    }

    this.stats.submitted++;
    this.queue
      .add(() => this.run(name, unit))
      .catch((error: unknown) => {
        // run() settles every unit itself; only a throwing logger lands here
        this.logger.error(`Task queue failed while running '${name}'`, error);
      });
  }

  /**
   * Resolves once every submitted unit, and every unit they submitted, has finished
   */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }

  /**
   * Drain, then refuse further submissions
   */
  async close(): Promise<void> {
    await this.drain();
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): QueueStats {
    return {
      ...this.stats,
      pending: this.queue.size + this.queue.pending,
    };
  }

  private async run(name: string, unit: TaskUnit): Promise<void> {
    // p-queue starts an idle job synchronously; yield so the submitter returns first
    await Promise.resolve();

    const trace = this.logger.startTrace(name);
    const watchdog = this.startWatchdog(name);
    try {
      await unit();
      this.stats.completed++;
      this.logger.endTrace(trace, 'success');
    } catch (error) {
      this.logger.endTrace(trace, 'error', error instanceof Error ? error : undefined);
      this.stats.failed++;
      this.report(name, error);
    } finally {
      if (watchdog) {
        clearTimeout(watchdog);
      }
    }
  }

  /**
   * Reports an overrun without releasing the lane: the next unit still waits
   * for this one to settle.
   */
  private startWatchdog(name: string): NodeJS.Timeout | undefined {
    const { timeout } = this;
    if (timeout === undefined) {
      return undefined;
    }

    return setTimeout(() => {
      this.stats.timedOut++;
      this.report(
        name,
        new TelemetryError(`Unit '${name}' is still running after ${timeout}ms`, 'TASK_TIMEOUT', {
          details: { unit: name, timeout },
        })
      );
    }, timeout);
  }

  private report(name: string, error: unknown): void {
    const normalized = this.errorHandler.handle(error, { unit: name });
    if (this.onError) {
      try {
        this.onError(normalized, name);
      } catch (callbackError) {
        this.logger.warn(`onError callback threw while reporting '${name}'`, callbackError);
      }
    }
  }
}
