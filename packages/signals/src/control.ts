// Dispatch control - thrown by slot targets to steer a running call

/**
 * Throw from a slot target to end the current call. Slots after it do not
 * run and `Signal.lastStatus` becomes `"stopped"`.
 */
export class StopDispatch extends Error {
  constructor(message = "Dispatch stopped") {
    super(message);
    this.name = "StopDispatch";
  }
}

/**
 * Throw from a slot target to pause the current call. The remaining slots
 * run on the next `Signal.call` or `Signal.resume`; until then the signal
 * refuses to add or delete slots.
 */
export class DeferDispatch extends Error {
  constructor(message = "Dispatch deferred") {
    super(message);
    this.name = "DeferDispatch";
  }
}

// Outcome of the most recent call
export type DispatchStatus = "done" | "stopped" | "deferred" | "failed";
