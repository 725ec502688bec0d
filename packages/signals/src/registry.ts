// Signal Registry - signals shared by name

import { Signal, type SignalOptions } from "./signal";

const OPTION_KEYS = ["reverse", "defaultPriority", "errorPolicy"] as const;

/**
 * Hands out one signal per name for as long as something else holds it.
 *
 * Entries are weak: once every reference to a signal is gone the name frees
 * up and the next `get` creates a fresh signal.
 */
export class SignalRegistry<S = unknown, A extends unknown[] = unknown[], R = unknown> {
  private entries: Map<string, WeakRef<Signal<S, A, R>>> = new Map();
  private readonly finalizer = new FinalizationRegistry<string>((name) => {
    if (this.entries.get(name)?.deref() === undefined) {
      this.entries.delete(name);
    }
  });

  // Get the live signal for a name, creating it if needed
  get(name: string, options: SignalOptions = {}): Signal<S, A, R> {
    const existing = this.entries.get(name)?.deref();
    if (existing) {
      const conflicts = OPTION_KEYS.filter(
        (key) => options[key] !== undefined && options[key] !== existing[key]
      );
      if (conflicts.length > 0) {
        console.warn(
          `[SignalRegistry] Signal '${name}' already exists; ignoring ${conflicts
            .map((key) => `${key}=${String(options[key])}`)
            .join(", ")}`
        );
      }
      return existing;
    }

    const signal = new Signal<S, A, R>(name, options);
    this.entries.set(name, new WeakRef(signal));
    this.finalizer.register(signal, name, signal);
    return signal;
  }

  has(name: string): boolean {
    return this.entries.get(name)?.deref() !== undefined;
  }

  // Names with a live signal
  names(): string[] {
    return Array.from(this.entries.keys()).filter((name) => this.has(name));
  }

  // Forget a name. The signal itself keeps working for whoever holds it.
  delete(name: string): boolean {
    const signal = this.entries.get(name)?.deref();
    if (signal) {
      this.finalizer.unregister(signal);
    }
    return this.entries.delete(name) && signal !== undefined;
  }
}

const defaultRegistry = new SignalRegistry();

// Shared signal from the process-wide registry
export function sharedSignal(name: string, options: SignalOptions = {}): Signal<unknown, unknown[], unknown> {
  return defaultRegistry.get(name, options);
}
