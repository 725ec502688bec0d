// Core Package - shared sentinel and error types for Lantern

export { ANY, type Any, isAny, describeListener } from "./sentinel";

export {
  ErrorCode,
  LanternError,
  SlotError,
  SignalError,
  DispatchError,
  type SlotFailure,
  Errors,
  formatErrors,
  wrapError,
  describeValue,
} from "./errors";
