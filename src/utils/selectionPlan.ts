// src/utils/selectionPlan.ts
//
// Ordered signal selection, capped at the graph count. Position in the
// plan is the graph slot and the colour index.

import { MAX_GRAPH_COUNT, MIN_GRAPH_COUNT, SIGNAL_COLOURS } from "../constants";
import type { SignalKey } from "../types/signal";
import { InvalidGraphCountError, LimitExceededError } from "./errors";
import { sameSignalKey } from "./signalKey";

export type SelectionPlan = readonly SignalKey[];

export type SelectionCheck =
  | { status: "accepted"; plan: SelectionPlan }
  | { status: "duplicate"; plan: SelectionPlan }
  | { status: "rejected"; error: LimitExceededError };

/**
 * Try to append a key. Over the cap → rejected with LimitExceeded, plan
 * untouched. A key already in the plan is reported as duplicate.
 */
export function selectionLimitCheck(plan: SelectionPlan, newKey: SignalKey, maxCount: number): SelectionCheck {
  if (plan.some((k) => sameSignalKey(k, newKey))) {
    return { status: "duplicate", plan };
  }
  if (plan.length >= maxCount) {
    return { status: "rejected", error: new LimitExceededError(maxCount) };
  }
  return { status: "accepted", plan: [...plan, newKey] };
}

export function removeFromPlan(plan: SelectionPlan, key: SignalKey): SelectionPlan {
  return plan.filter((k) => !sameSignalKey(k, key));
}

/**
 * @throws InvalidGraphCountError unless count is an integer in 1–10
 */
export function validateGraphCount(count: number): number {
  if (!Number.isInteger(count) || count < MIN_GRAPH_COUNT || count > MAX_GRAPH_COUNT) {
    throw new InvalidGraphCountError(count, MIN_GRAPH_COUNT, MAX_GRAPH_COUNT);
  }
  return count;
}

/** Plan cut down to a (smaller) graph count, dropping from the tail */
export function truncatePlan(plan: SelectionPlan, graphCount: number): SelectionPlan {
  return plan.length > graphCount ? plan.slice(0, graphCount) : plan;
}

/** Colour for a graph slot, cycling the palette */
export function colourForIndex(index: number): string {
  return SIGNAL_COLOURS[index % SIGNAL_COLOURS.length];
}
