import { TelemetryEvent } from './telemetryEvent';

/**
 * What should happen to an event after an application handler has seen it
 */
export enum EventDecision {
  /** Apply default handling: batch the event into the events ping */
  Enqueue = 'enqueue',
  /** The handler took care of the event; drop it */
  Suppress = 'suppress',
}

/**
 * Application hook that sees every recorded event before default handling
 */
export interface TelemetryEventHandler {
  handleEvent(event: TelemetryEvent): EventDecision;
}

/**
 * Two-stage event routing. The optional application handler may veto an
 * event; everything it does not suppress goes to the default stage.
 */
export class EventInterceptionChain {
  constructor(
    private readonly defaultStage: (event: TelemetryEvent) => void,
    private readonly handler: TelemetryEventHandler | undefined,
    private readonly onHandlerError: (error: unknown, event: TelemetryEvent) => void
  ) {}

  hasHandler(): boolean {
    return this.handler !== undefined;
  }

  handle(event: TelemetryEvent): EventDecision {
    const decision = this.decide(event);
    if (decision === EventDecision.Enqueue) {
      this.defaultStage(event);
    }
    return decision;
  }

  private decide(event: TelemetryEvent): EventDecision {
    if (!this.handler) {
      return EventDecision.Enqueue;
    }

    try {
      return this.handler.handleEvent(event);
    } catch (error) {
      // A throwing handler drops the event
      this.onHandlerError(error, event);
      return EventDecision.Suppress;
    }
  }
}
