// Signals exports
export {
  PRIORITY_NORMAL,
  type Sender,
  type SlotTarget,
  Slot,
  compareSlots,
} from "./slot";

export {
  type ErrorPolicy,
  type SignalOptions,
  type AddOptions,
  Signal,
} from "./signal";

export { type DispatchStatus, StopDispatch, DeferDispatch } from "./control";

export { SignalRegistry, sharedSignal } from "./registry";

export { ANY, type Any } from "@lantern/core";
