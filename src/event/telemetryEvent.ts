import { ValidationError } from '../errors/types';

const MAX_LENGTH_CATEGORY = 30;
const MAX_LENGTH_METHOD = 20;
const MAX_LENGTH_OBJECT = 20;
const MAX_LENGTH_VALUE = 80;
const MAX_EXTRA_KEYS = 10;
const MAX_LENGTH_EXTRA_KEY = 15;
const MAX_LENGTH_EXTRA_VALUE = 80;

/**
 * Serialized form of an event inside an event ping:
 * `[timestamp, category, method, object, value?, extras?]`
 */
export type SerializedEvent =
  | [number, string, string, string]
  | [number, string, string, string, string | null]
  | [number, string, string, string, string | null, Record<string, string>];

export interface TelemetryEventOptions {
  value?: string;
  extras?: Record<string, string>;
  /** Milliseconds since the epoch. Default: now */
  timestamp?: number;
}

function checkLength(field: string, text: string, max: number): void {
  if (text.length === 0 || text.length > max) {
    throw new ValidationError(`${field} must be between 1 and ${max} characters`, field, text);
  }
}

/**
 * A single behavioral event: something a user did, described by a category,
 * a method (the action) and an object (what it was done to).
 */
export class TelemetryEvent {
  readonly category: string;
  readonly method: string;
  readonly object: string;
  readonly value: string | undefined;
  readonly timestamp: number;
  private readonly extras: Map<string, string> = new Map();
  private sealed = false;

  constructor(category: string, method: string, object: string, options: TelemetryEventOptions = {}) {
    checkLength('category', category, MAX_LENGTH_CATEGORY);
    checkLength('method', method, MAX_LENGTH_METHOD);
    checkLength('object', object, MAX_LENGTH_OBJECT);
    if (options.value !== undefined) {
      checkLength('value', options.value, MAX_LENGTH_VALUE);
    }

    this.category = category;
    this.method = method;
    this.object = object;
    this.value = options.value;
    this.timestamp = options.timestamp ?? Date.now();

    for (const [key, value] of Object.entries(options.extras ?? {})) {
      this.extra(key, value);
    }
  }

  static create(category: string, method: string, object: string, value?: string): TelemetryEvent {
    return new TelemetryEvent(category, method, object, value === undefined ? {} : { value });
  }

  /**
   * Attach an extra key/value pair. Chainable.
   * @throws ValidationError once the event has been recorded
   */
  extra(key: string, value: string): this {
    if (this.sealed) {
      throw new ValidationError('Extras cannot change once an event has been recorded', 'extras', key);
    }
    if (!this.extras.has(key) && this.extras.size >= MAX_EXTRA_KEYS) {
      throw new ValidationError(`An event can carry at most ${MAX_EXTRA_KEYS} extras`, 'extras', key);
    }
    checkLength('extra key', key, MAX_LENGTH_EXTRA_KEY);
    checkLength('extra value', value, MAX_LENGTH_EXTRA_VALUE);

    this.extras.set(key, value);
    return this;
  }

  /**
   * Fixes the extras. Recording an event seals it.
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  getExtras(): Record<string, string> {
    return Object.fromEntries(this.extras);
  }

  toJSON(): SerializedEvent {
    const head: [number, string, string, string] = [this.timestamp, this.category, this.method, this.object];

    if (this.extras.size > 0) {
      return [...head, this.value ?? null, this.getExtras()];
    }
    if (this.value !== undefined) {
      return [...head, this.value];
    }
    return head;
  }
}
