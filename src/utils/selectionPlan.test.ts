import { describe, expect, it } from "vitest";
import type { SignalKey } from "../types/signal";
import { InvalidGraphCountError, LimitExceededError } from "./errors";
import {
  colourForIndex,
  removeFromPlan,
  selectionLimitCheck,
  truncatePlan,
  validateGraphCount,
  type SelectionPlan,
} from "./selectionPlan";

const key = (signalName: string): SignalKey => ({ messageName: "Engine", signalName });

describe("selectionLimitCheck", () => {
  it("appends in insertion order", () => {
    const first = selectionLimitCheck([], key("A"), 3);
    expect(first).toEqual({ status: "accepted", plan: [key("A")] });
    if (first.status !== "accepted") return;

    expect(selectionLimitCheck(first.plan, key("B"), 3)).toEqual({
      status: "accepted",
      plan: [key("A"), key("B")],
    });
  });

  it("rejects at the cap and leaves the plan untouched", () => {
    const plan: SelectionPlan = [key("A"), key("B")];
    const check = selectionLimitCheck(plan, key("C"), 2);

    expect(check.status).toBe("rejected");
    if (check.status !== "rejected") return;
    expect(check.error).toBeInstanceOf(LimitExceededError);
    expect(check.error.message).toBe("Maximum 2 signals can be selected");
    expect(plan).toEqual([key("A"), key("B")]);
  });

  it("reports duplicates without changing the plan", () => {
    const plan: SelectionPlan = [key("A")];
    const check = selectionLimitCheck(plan, key("A"), 1);
    expect(check).toEqual({ status: "duplicate", plan });
  });

  it("never grows past the graph count", () => {
    let plan: SelectionPlan = [];
    for (let i = 0; i < 20; i++) {
      const check = selectionLimitCheck(plan, key(`S${i % 7}`), 5);
      if (check.status !== "rejected") plan = check.plan;
      expect(plan.length).toBeLessThanOrEqual(5);
    }
    expect(plan.map((k) => k.signalName)).toEqual(["S0", "S1", "S2", "S3", "S4"]);
  });
});

describe("removeFromPlan", () => {
  it("removes the key and keeps the order of the rest", () => {
    expect(removeFromPlan([key("A"), key("B"), key("C")], key("B"))).toEqual([key("A"), key("C")]);
  });
});

describe("validateGraphCount", () => {
  it("accepts integers from 1 to 10", () => {
    expect(validateGraphCount(1)).toBe(1);
    expect(validateGraphCount(10)).toBe(10);
  });

  it("rejects anything else", () => {
    expect(() => validateGraphCount(0)).toThrow(InvalidGraphCountError);
    expect(() => validateGraphCount(11)).toThrow(InvalidGraphCountError);
    expect(() => validateGraphCount(2.5)).toThrow("Graph count must be an integer between 1 and 10, got 2.5");
  });
});

describe("truncatePlan", () => {
  it("drops keys from the tail", () => {
    const plan = [key("A"), key("B"), key("C")];
    expect(truncatePlan(plan, 2)).toEqual([key("A"), key("B")]);
    expect(truncatePlan(plan, 5)).toBe(plan);
  });
});

describe("colourForIndex", () => {
  it("cycles the palette", () => {
    expect(colourForIndex(0)).toBe("#3b82f6");
    expect(colourForIndex(1)).toBe("#ef4444");
    expect(colourForIndex(10)).toBe("#3b82f6");
  });
});
