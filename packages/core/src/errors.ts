// Error Handling for Lantern signals

// Error codes for categorization
export enum ErrorCode {
  // Lookup errors (1xx)
  SLOT_NOT_FOUND = 100,

  // Registration errors (2xx)
  INVALID_TARGET = 200,
  INVALID_PRIORITY = 201,
  INVALID_OPTION = 202,

  // Dispatch errors (3xx)
  DEFERRAL_SET = 300,
  DISPATCH_FAILED = 301,
}

// Hints for common errors
const ERROR_HINTS: Record<ErrorCode, string> = {
  [ErrorCode.SLOT_NOT_FOUND]: "The slot was deleted or belongs to another signal - use findById() to check first",

  [ErrorCode.INVALID_TARGET]: "Slots need a function target that accepts the sender as its first argument",
  [ErrorCode.INVALID_PRIORITY]: "Priorities must be numbers and cannot be NaN",
  [ErrorCode.INVALID_OPTION]: "Check the signal options against SignalOptions",

  [ErrorCode.DEFERRAL_SET]: "Call resume() to finish the deferred dispatch, or resetDefer() to drop it",
  [ErrorCode.DISPATCH_FAILED]: "Inspect failures for the error thrown by each slot",
};

// Render the runtime type of a value for error messages
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

// Base error class with code and hint
export class LanternError extends Error {
  readonly code: ErrorCode;
  readonly hint?: string;

  constructor(message: string, code: ErrorCode, hint?: string) {
    super(message);
    this.name = "LanternError";
    this.code = code;
    this.hint = hint ?? ERROR_HINTS[code];
  }

  // Format the error for display
  format(options: { showHint?: boolean; showCode?: boolean } = {}): string {
    const { showHint = true, showCode = true } = options;
    const parts: string[] = [];

    const codeStr = showCode ? ` [E${this.code}]` : "";
    parts.push(`${this.name}${codeStr}: ${this.message}`);

    if (showHint && this.hint) {
      parts.push("");
      parts.push(`Hint: ${this.hint}`);
    }

    return parts.join("\n");
  }
}

export class SlotError extends LanternError {
  readonly id?: number;

  constructor(message: string, code: ErrorCode, id?: number, hint?: string) {
    super(message, code, hint);
    this.name = "SlotError";
    this.id = id;
  }
}

export class SignalError extends LanternError {
  readonly signal: string;

  constructor(message: string, code: ErrorCode, signal: string, hint?: string) {
    super(message, code, hint);
    this.name = "SignalError";
    this.signal = signal;
  }
}

// A slot that threw while the signal collected failures
export interface SlotFailure {
  id: number;
  error: unknown;
}

export class DispatchError extends SignalError {
  readonly failures: readonly SlotFailure[];

  constructor(signal: string, failures: readonly SlotFailure[]) {
    const count = failures.length;
    super(
      `${count} slot${count === 1 ? "" : "s"} failed while calling signal '${signal}'`,
      ErrorCode.DISPATCH_FAILED,
      signal
    );
    this.name = "DispatchError";
    this.failures = failures;
  }

  // Every failure as a LanternError, in dispatch order
  causes(): LanternError[] {
    return this.failures.map(({ id, error }) => wrapError(error, id));
  }

  override format(options: { showHint?: boolean; showCode?: boolean } = {}): string {
    return `${super.format(options)}\n\n${formatErrors(this.causes())}`;
  }
}

// Error factory functions for common cases
export const Errors = {
  // Lookup errors
  slotNotFound: (id: number) =>
    new SlotError(`Slot not found: ${id}`, ErrorCode.SLOT_NOT_FOUND, id),

  // Registration errors
  invalidTarget: (got: unknown) =>
    new SlotError(
      `Slot target must be a function, got ${describeValue(got)}`,
      ErrorCode.INVALID_TARGET
    ),

  invalidPriority: (got: unknown) =>
    new SlotError(
      typeof got === "number"
        ? "Slot priority cannot be NaN"
        : `Slot priority must be a number, got ${describeValue(got)}`,
      ErrorCode.INVALID_PRIORITY
    ),

  invalidOption: (name: string, expected: string, got: unknown) =>
    new LanternError(
      `Option '${name}' expects ${expected}, got ${describeValue(got)}`,
      ErrorCode.INVALID_OPTION
    ),

  // Dispatch errors
  deferralSet: (signal: string, operation: string) =>
    new SignalError(
      `Cannot ${operation} on signal '${signal}' while a deferred call is pending`,
      ErrorCode.DEFERRAL_SET,
      signal
    ),

  dispatchFailed: (signal: string, failures: readonly SlotFailure[]) =>
    new DispatchError(signal, failures),
};

// Format multiple errors
export function formatErrors(errors: LanternError[]): string {
  if (errors.length === 0) return "No errors";

  const header = errors.length === 1
    ? "1 error found:"
    : `${errors.length} errors found:`;

  const formatted = errors.map((e, i) => {
    const prefix = errors.length > 1 ? `\n[${i + 1}] ` : "\n";
    return prefix + e.format({ showCode: true, showHint: false });
  });

  return header + formatted.join("\n");
}

// Wrap anything a slot threw so it can be formatted alongside Lantern errors
export function wrapError(error: unknown, id?: number): LanternError {
  if (error instanceof LanternError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const prefix = id === undefined ? "" : `Slot ${id}: `;
  return new SlotError(`${prefix}${message}`, ErrorCode.DISPATCH_FAILED, id, "");
}
