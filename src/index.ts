// Addressing
export type { ActorRef } from "./actor-ref.js";
export { cloneScoped } from "./actor-ref.js";

// Mailboxes
export type { Mailbox, MailboxOptions, Receiver } from "./mailbox.js";
export { unboundedMailbox } from "./mailbox.js";

// Actor context
export type { ActorContext } from "./context.js";

// Spawning
export type { Completion, Spawner } from "./spawner.js";
export {
  daemonSpawner,
  fromFiber,
  runtimeSpawner,
  scopedSpawner,
  settleExit,
} from "./spawner.js";

// Launch
export type { LaunchOptions } from "./actor.js";
export { launch } from "./actor.js";

// Errors
export { ExecutionError, NoSender } from "./errors.js";

// Logging
export type { LogFormat } from "./logging.js";
export { ActorLogging, LoggingConfig } from "./logging.js";

// Inspection / introspection
export type {
  ClosedEvent,
  ExitEvent,
  ExitOutcome,
  InspectionEvent,
  LaunchEvent,
  ReceiveEvent,
} from "./inspection.js";
export {
  collectingInspector,
  consoleInspector,
  Inspector as InspectorService,
  makeInspector,
} from "./inspection.js";
export type { Inspector } from "./inspection.js";

// Testing utilities
export { collector, lazySpawner, yieldFibers } from "./testing.js";
