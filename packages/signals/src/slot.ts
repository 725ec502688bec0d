// Slot - one registration on a signal

import { type Any, describeListener, isAny } from "@lantern/core";

// The normal priority point. It keeps its meaning when a signal is reversed.
export const PRIORITY_NORMAL = 0;

// Sender values seen by targets: an application value, or ANY for broadcasts
export type Sender<S> = S | Any;

export type SlotTarget<S = unknown, A extends unknown[] = [], R = unknown> = (
  sender: Sender<S>,
  ...args: A
) => R;

/**
 * A registered target with its priority, listener filter and identity.
 *
 * Slots are created by `Signal.add` and never change afterwards; the `id` is
 * what `Signal.delete` and `Signal.findById` work with.
 */
export class Slot<S = unknown, A extends unknown[] = [], R = unknown> {
  readonly id: number;
  readonly priority: number;
  readonly target: SlotTarget<S, A, R>;
  readonly listener: Sender<S>;

  constructor(
    id: number,
    priority: number,
    target: SlotTarget<S, A, R>,
    listener: Sender<S>
  ) {
    this.id = id;
    this.priority = priority;
    this.target = target;
    this.listener = listener;
    Object.freeze(this);
  }

  // Dispatch-time matching: ANY on either side matches everything, otherwise
  // SameValueZero (0 and -0 are one sender, NaN matches NaN)
  matches(sender: Sender<S>): boolean {
    return isAny(this.listener) || isAny(sender) || sameValueZero(this.listener, sender);
  }

  invoke(sender: Sender<S>, ...args: A): R {
    return this.target(sender, ...args);
  }

  toString(): string {
    return `Slot(priority=${this.priority}, id=${this.id}, listener=${describeListener(this.listener)})`;
  }
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

// Ordering key: priority (descending when reversed), then id ascending
export function compareSlots(
  a: { priority: number; id: number },
  b: { priority: number; id: number },
  reverse = false
): number {
  if (a.priority !== b.priority) {
    const byPriority = a.priority < b.priority ? -1 : 1;
    return reverse ? -byPriority : byPriority;
  }
  return a.id - b.id;
}
