import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../src/lib/errors.js";
import { canTransition, isTerminal, transition } from "../src/lib/state.js";

describe("job state machine", () => {
  it("allows the forward moves", () => {
    expect(canTransition("pending", "running")).toBe(true);
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("pending", "cancelled")).toBe(true);
    expect(canTransition("running", "completed")).toBe(true);
    expect(canTransition("running", "failed")).toBe(true);
    expect(canTransition("running", "cancelled")).toBe(true);
  });

  it("rejects moves backwards or out of terminal states", () => {
    expect(canTransition("running", "pending")).toBe(false);
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("completed", "running")).toBe(false);
    expect(canTransition("cancelled", "completed")).toBe(false);
  });

  it("throws on an invalid transition", () => {
    expect(transition("pending", "running")).toBe("running");
    expect(() => transition("completed", "running")).toThrow(InvalidTransitionError);
    expect(() => transition("failed", "cancelled")).toThrow(
      "Cannot move job from failed to cancelled"
    );
  });

  it("knows the terminal states", () => {
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("pending")).toBe(false);
    expect(isTerminal("running")).toBe(false);
  });
});
