import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ANY } from "@lantern/core";
import { SignalRegistry, sharedSignal } from "./registry";
import { Signal } from "./signal";

describe("SignalRegistry", () => {
  let registry: SignalRegistry<string>;

  beforeEach(() => {
    registry = new SignalRegistry();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the same signal for the same name", () => {
    const a = registry.get("a");
    const b = registry.get("b");

    expect(registry.get("a")).toBe(a);
    expect(registry.get("b")).toBe(b);
    expect(a).not.toBe(b);
  });

  it("shares slots between holders of a name", () => {
    const calls: string[] = [];
    registry.get("saved").add(() => calls.push("first holder"));
    registry.get("saved").add(() => calls.push("second holder"));

    registry.get("saved").call(ANY);

    expect(calls).toEqual(["first holder", "second holder"]);
  });

  it("creates signals with the given options", () => {
    const signal = registry.get("reversed", { reverse: true, defaultPriority: 3 });

    expect(signal.name).toBe("reversed");
    expect(signal.reverse).toBe(true);
    expect(signal.defaultPriority).toBe(3);
  });

  it("warns and keeps the existing signal on conflicting options", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const original = registry.get("a");

    expect(registry.get("a", { reverse: true, errorPolicy: "collect" })).toBe(original);
    expect(original.reverse).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[SignalRegistry] Signal 'a' already exists; ignoring reverse=true, errorPolicy=collect"
    );
  });

  it("does not warn when options agree", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    registry.get("a", { reverse: true });
    registry.get("a", { reverse: true });
    registry.get("a");

    expect(warn).not.toHaveBeenCalled();
  });

  it("tracks names", () => {
    registry.get("a");
    registry.get("b");

    expect(registry.has("a")).toBe(true);
    expect(registry.has("c")).toBe(false);
    expect(registry.names()).toEqual(["a", "b"]);
  });

  it("forgets deleted names", () => {
    const first = registry.get("a");

    expect(registry.delete("a")).toBe(true);
    expect(registry.delete("a")).toBe(false);
    expect(registry.has("a")).toBe(false);
    expect(registry.get("a")).not.toBe(first);
  });

  it("keeps plain signals unshared", () => {
    expect(new Signal("a")).not.toBe(new Signal("a"));
    expect(new Signal("a")).not.toBe(registry.get("a"));
  });
});

describe("sharedSignal", () => {
  it("shares signals through the default registry", () => {
    const signal = sharedSignal("lantern.test.shared");

    expect(sharedSignal("lantern.test.shared")).toBe(signal);
    expect(sharedSignal("lantern.test.other")).not.toBe(signal);
  });
});
