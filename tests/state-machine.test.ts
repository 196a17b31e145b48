import { describe, expect, it } from "vitest";
import { assertTransition, canTransition, isFailureState } from "../src/domain/state-machine.js";
import { AppError } from "../src/infra/app-error.js";

describe("Order transaction state machine", () => {
  it("allows valid transitions", () => {
    expect(canTransition("open", "in_progress")).toBe(true);
    expect(canTransition("open", "failed")).toBe(true);
    expect(canTransition("open", "cancelled")).toBe(true);
    expect(canTransition("in_progress", "paid")).toBe(true);
    expect(canTransition("in_progress", "cancelled")).toBe(true);
    expect(canTransition("paid", "refunded")).toBe(true);
  });

  it("only leaves failure states through a reopen", () => {
    expect(canTransition("failed", "open")).toBe(true);
    expect(canTransition("cancelled", "open")).toBe(true);
    expect(canTransition("failed", "paid")).toBe(false);
    expect(canTransition("cancelled", "failed")).toBe(false);
  });

  it("blocks invalid transitions", () => {
    expect(canTransition("paid", "failed")).toBe(false);
    expect(canTransition("refunded", "open")).toBe(false);
    expect(() => assertTransition("paid", "failed")).toThrowError(AppError);

    try {
      assertTransition("refunded", "paid");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.statusCode).toBe(409);
        expect(error.code).toBe("invalid_state_transition");
        expect(error.message).toBe("Transition from 'refunded' to 'paid' is not allowed.");
      }
    }
  });

  it("marks failure states", () => {
    expect(isFailureState("failed")).toBe(true);
    expect(isFailureState("cancelled")).toBe(true);
    expect(isFailureState("open")).toBe(false);
    expect(isFailureState("paid")).toBe(false);
  });
});
