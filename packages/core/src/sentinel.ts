// The ANY sentinel - matches, and is matched by, every listener and sender

export const ANY: unique symbol = Symbol("lantern.any");

export type Any = typeof ANY;

export function isAny(value: unknown): value is Any {
  return value === ANY;
}

// Render a listener or sender for display
export function describeListener(value: unknown): string {
  if (value === ANY) return "ANY";
  if (typeof value === "string") return JSON.stringify(value);
  // Null-prototype objects have no toString of their own
  if (typeof value === "object" && value !== null && Object.getPrototypeOf(value) === null) {
    return Object.prototype.toString.call(value);
  }
  return String(value);
}
