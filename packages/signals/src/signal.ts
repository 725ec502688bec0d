// Signal - an ordered set of slots for one named event

import {
  ANY,
  Errors,
  describeListener,
  type SlotFailure,
} from "@lantern/core";
import {
  PRIORITY_NORMAL,
  Slot,
  compareSlots,
  type Sender,
  type SlotTarget,
} from "./slot";
import { type Comparator, indexOfSorted, withInserted, withoutIndex } from "./sorted";
import { DeferDispatch, StopDispatch, type DispatchStatus } from "./control";

// What happens when a slot target throws during call()
export type ErrorPolicy = "throw" | "collect";

export interface SignalOptions {
  reverse?: boolean; // Run larger priorities first
  defaultPriority?: number; // Priority for slots added without one
  errorPolicy?: ErrorPolicy; // "throw" stops at the first failure
}

export interface AddOptions<S> {
  priority?: number;
  listener?: Sender<S>;
}

// A paused call, resumed from `index` of the captured order
interface Deferral<S, A extends unknown[], R> {
  order: readonly Slot<S, A, R>[];
  index: number;
  sender: Sender<S>;
  args: A;
}

const ERROR_POLICIES: readonly ErrorPolicy[] = ["throw", "collect"];

/**
 * A named event holding slots in dispatch order.
 *
 * Slots run by priority (ascending, or descending when `reverse` is set) and
 * then by the order they were added. `call` walks the slot order captured
 * when it starts, so targets may add or delete slots on the same signal
 * while it runs; the changes apply from the next call.
 *
 * @example
 * ```ts
 * const saved = new Signal<string>("document.saved");
 * saved.add((sender) => console.log("saved by", sender));
 * saved.add(() => audit(), 10, "editor");
 * saved.call("editor");
 * ```
 */
export class Signal<S = unknown, A extends unknown[] = [], R = unknown> {
  readonly name: string;
  readonly reverse: boolean;
  readonly defaultPriority: number;
  readonly errorPolicy: ErrorPolicy;

  // Replaced, never mutated: a captured reference is a stable snapshot
  private order: readonly Slot<S, A, R>[] = [];
  private byId: Map<number, Slot<S, A, R>> = new Map();
  private nextId = 0;
  private deferred: Deferral<S, A, R> | undefined = undefined;
  private status: DispatchStatus | undefined = undefined;
  private readonly compare: Comparator<Slot<S, A, R>>;

  constructor(name = "<anonymous>", options: SignalOptions = {}) {
    const { reverse = false, defaultPriority = PRIORITY_NORMAL, errorPolicy = "throw" } = options;

    if (typeof reverse !== "boolean") {
      throw Errors.invalidOption("reverse", "a boolean", reverse);
    }
    if (typeof defaultPriority !== "number" || Number.isNaN(defaultPriority)) {
      throw Errors.invalidOption("defaultPriority", "a number", defaultPriority);
    }
    if (!ERROR_POLICIES.includes(errorPolicy)) {
      throw Errors.invalidOption("errorPolicy", `one of ${ERROR_POLICIES.join(", ")}`, errorPolicy);
    }

    this.name = name;
    this.reverse = reverse;
    this.defaultPriority = defaultPriority;
    this.errorPolicy = errorPolicy;
    this.compare = (a, b) => compareSlots(a, b, this.reverse);
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Register a target. Returns the new slot, whose `id` can be passed to
   * `delete` and `findById` later.
   *
   * @throws SlotError when the target is not a function or the priority is
   * not a number
   * @throws SignalError while a deferred call is pending
   */
  add(target: SlotTarget<S, A, R>, priority?: number, listener?: Sender<S>): Slot<S, A, R>;
  add(target: SlotTarget<S, A, R>, options: AddOptions<S>): Slot<S, A, R>;
  add(
    target: SlotTarget<S, A, R>,
    priorityOrOptions?: number | AddOptions<S>,
    listener?: Sender<S>
  ): Slot<S, A, R> {
    let priority: unknown = priorityOrOptions;
    let slotListener: Sender<S> | undefined = listener;

    if (typeof priorityOrOptions === "object" && priorityOrOptions !== null) {
      priority = priorityOrOptions.priority;
      slotListener = priorityOrOptions.listener;
    }
    priority = priority ?? this.defaultPriority;

    if (typeof target !== "function") {
      throw Errors.invalidTarget(target);
    }
    if (typeof priority !== "number" || Number.isNaN(priority)) {
      throw Errors.invalidPriority(priority);
    }
    this.assertNotDeferred("add a slot");

    // Only an omitted listener means ANY; null is a listener like any other
    const slot = new Slot<S, A, R>(
      this.nextId++,
      priority,
      target,
      slotListener === undefined ? ANY : slotListener
    );
    this.order = withInserted(this.order, slot, this.compare);
    this.byId.set(slot.id, slot);
    return slot;
  }

  // Registration helper for wrapping existing functions
  wraps(options: AddOptions<S> = {}): (target: SlotTarget<S, A, R>) => Slot<S, A, R> {
    return (target) => this.add(target, options);
  }

  // ---------------------------------------------------------------------------
  // Removal
  // ---------------------------------------------------------------------------

  // Remove a slot by reference or id. False when it is not on this signal.
  delete(slotOrId: Slot<S, A, R> | number): boolean {
    this.assertNotDeferred("delete a slot");

    const slot = typeof slotOrId === "number" ? this.byId.get(slotOrId) : slotOrId;
    if (!slot || this.byId.get(slot.id) !== slot) {
      return false;
    }

    const index = indexOfSorted(this.order, slot, this.compare);
    if (index < 0) {
      return false;
    }

    this.order = withoutIndex(this.order, index);
    this.byId.delete(slot.id);
    return true;
  }

  // Remove every slot registered with the target. Returns how many went.
  deleteTarget(target: SlotTarget<S, A, R>): number {
    this.assertNotDeferred("delete slots");

    const kept = this.order.filter((slot) => slot.target !== target);
    const removed = this.order.length - kept.length;
    if (removed > 0) {
      this.order = kept;
      this.byId = new Map(kept.map((slot): [number, Slot<S, A, R>] => [slot.id, slot]));
    }
    return removed;
  }

  // Remove all slots. Ids keep counting from where they were.
  clear(): void {
    this.assertNotDeferred("clear slots");
    this.order = [];
    this.byId = new Map();
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  /**
   * Invoke every slot matching `sender`, in order, and return their results.
   *
   * If a call was deferred, this continues it instead: the deferred sender is
   * kept and `args` replace the deferred arguments when any are given.
   */
  call(sender: Sender<S>, ...args: A): R[] {
    const deferred = this.deferred;
    if (deferred) {
      return this.continueDeferred(deferred, args.length > 0 ? args : deferred.args);
    }

    return this.dispatch(this.order, 0, sender, args);
  }

  // Continue a deferred call. Undefined when nothing is deferred.
  resume(): R[] | undefined {
    const deferred = this.deferred;
    if (!deferred) return undefined;

    return this.continueDeferred(deferred, deferred.args);
  }

  // Drop a deferred call; the remaining slots will not run
  resetDefer(): void {
    this.deferred = undefined;
  }

  // Start a fresh call even if one is deferred
  resetCall(sender: Sender<S>, ...args: A): R[] {
    this.resetDefer();
    return this.call(sender, ...args);
  }

  // Slots that call(sender) would run, from a snapshot of the current order
  *matching(sender: Sender<S>): Generator<Slot<S, A, R>, void, undefined> {
    const order = this.order;
    for (const slot of order) {
      if (slot.matches(sender)) {
        yield slot;
      }
    }
  }

  get isDeferred(): boolean {
    return this.deferred !== undefined;
  }

  // Outcome of the most recent call; undefined before the first one
  get lastStatus(): DispatchStatus | undefined {
    return this.status;
  }

  // Slots removed before the deferral was set must not run on resume
  private continueDeferred(deferred: Deferral<S, A, R>, args: A): R[] {
    this.deferred = undefined;
    const remaining = deferred.order
      .slice(deferred.index)
      .filter((slot) => this.byId.get(slot.id) === slot);
    return this.dispatch(remaining, 0, deferred.sender, args);
  }

  private dispatch(
    order: readonly Slot<S, A, R>[],
    start: number,
    sender: Sender<S>,
    args: A
  ): R[] {
    const results: R[] = [];
    const failures: SlotFailure[] = [];
    let status: DispatchStatus = "done";

    for (let i = start; i < order.length; i++) {
      const slot = order[i];
      if (!slot.matches(sender)) continue;

      try {
        results.push(slot.invoke(sender, ...args));
      } catch (error) {
        if (error instanceof StopDispatch) {
          status = "stopped";
          break;
        }
        if (error instanceof DeferDispatch) {
          this.deferred = { order, index: i + 1, sender, args };
          status = "deferred";
          break;
        }
        if (this.errorPolicy === "throw") {
          this.status = "failed";
          throw error;
        }
        failures.push({ id: slot.id, error });
      }
    }

    if (failures.length > 0) {
      this.status = "failed";
      throw Errors.dispatchFailed(this.name, failures);
    }

    this.status = status;
    return results;
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  findById(id: number): Slot<S, A, R> | undefined {
    return this.byId.get(id);
  }

  /**
   * Like `findById`, for callers that treat a missing slot as a bug.
   *
   * @throws SlotError with `ErrorCode.SLOT_NOT_FOUND`
   */
  getById(id: number): Slot<S, A, R> {
    const slot = this.byId.get(id);
    if (!slot) {
      throw Errors.slotNotFound(id);
    }
    return slot;
  }

  // Slots registered with this exact function, in dispatch order
  findByTarget(target: SlotTarget<S, A, R>): Slot<S, A, R>[] {
    return this.order.filter((slot) => slot.target === target);
  }

  // Slots registered with exactly this listener. ANY only finds ANY slots.
  findByListener(listener: Sender<S>): Slot<S, A, R>[] {
    return this.order.filter((slot) => Object.is(slot.listener, listener));
  }

  has(slot: Slot<S, A, R>): boolean {
    return this.byId.get(slot.id) === slot;
  }

  get size(): number {
    return this.order.length;
  }

  // Current slots in dispatch order
  get slots(): readonly Slot<S, A, R>[] {
    return this.order;
  }

  [Symbol.iterator](): Iterator<Slot<S, A, R>> {
    return this.order[Symbol.iterator]();
  }

  // ---------------------------------------------------------------------------
  // Priority helpers
  // ---------------------------------------------------------------------------

  // A priority that runs before all of `slots`
  priorityHigher(slots: readonly Slot<S, A, R>[] = this.order, boost = 1): number {
    if (slots.length === 0) return this.defaultPriority;
    return this.reverse ? maxPriority(slots) + boost : minPriority(slots) - boost;
  }

  // A priority that runs after all of `slots`
  priorityLower(slots: readonly Slot<S, A, R>[] = this.order, boost = 1): number {
    if (slots.length === 0) return this.defaultPriority;
    return this.reverse ? minPriority(slots) - boost : maxPriority(slots) + boost;
  }

  toString(): string {
    const slots = this.order.map((slot) => slot.toString()).join(", ");
    return `Signal(name=${describeListener(this.name)}, reverse=${this.reverse}, slots=[${slots}])`;
  }

  private assertNotDeferred(operation: string): void {
    if (this.deferred) {
      throw Errors.deferralSet(this.name, operation);
    }
  }
}

function minPriority(slots: readonly { priority: number }[]): number {
  return slots.reduce((min, slot) => Math.min(min, slot.priority), Infinity);
}

function maxPriority(slots: readonly { priority: number }[]): number {
  return slots.reduce((max, slot) => Math.max(max, slot.priority), -Infinity);
}
