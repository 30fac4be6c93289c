import { Context } from "effect";

// ============================================================================
// Inspection Events
// ============================================================================

/**
 * Event emitted when an actor is launched
 */
export interface LaunchEvent {
  readonly type: "@actor.launch";
  readonly actorId: string;
  readonly timestamp: number;
}

/**
 * Event emitted when an actor takes a message from its mailbox
 */
export interface ReceiveEvent {
  readonly type: "@actor.receive";
  readonly actorId: string;
  readonly message: unknown;
  readonly timestamp: number;
}

/**
 * Event emitted the first time an actor observes NoSender
 */
export interface ClosedEvent {
  readonly type: "@actor.closed";
  readonly actorId: string;
  readonly timestamp: number;
}

/**
 * How an actor body ended
 */
export type ExitOutcome = "success" | "failure" | "interrupted" | "defect";

/**
 * Event emitted when an actor body exits
 */
export interface ExitEvent {
  readonly type: "@actor.exit";
  readonly actorId: string;
  readonly outcome: ExitOutcome;
  readonly timestamp: number;
}

/**
 * Union of all inspection events
 */
export type InspectionEvent = LaunchEvent | ReceiveEvent | ClosedEvent | ExitEvent;

// ============================================================================
// Inspector Service
// ============================================================================

/**
 * Inspector interface for observing actor behavior
 */
export interface Inspector {
  readonly onInspect: (event: InspectionEvent) => void;
}

/**
 * Inspector service tag - optional service read when an actor is launched
 */
export const Inspector = Context.GenericTag<Inspector>("effect-mailbox/Inspector");

/**
 * Create an inspector from a callback function.
 */
export const makeInspector = (onInspect: (event: InspectionEvent) => void): Inspector => ({
  onInspect,
});

// ============================================================================
// Built-in Inspectors
// ============================================================================

/**
 * Console inspector that logs events in a readable format
 */
export const consoleInspector = (): Inspector =>
  makeInspector((event) => {
    const prefix = `[${event.actorId}]`;
    switch (event.type) {
      case "@actor.launch":
        console.log(prefix, "launched");
        break;
      case "@actor.receive":
        console.log(prefix, "received", event.message);
        break;
      case "@actor.closed":
        console.log(prefix, "mailbox closed");
        break;
      case "@actor.exit":
        console.log(prefix, "exited →", event.outcome);
        break;
    }
  });

/**
 * Collecting inspector that stores events in an array for testing
 */
export const collectingInspector = (events: InspectionEvent[]): Inspector =>
  makeInspector((event) => events.push(event));
