import type { OrderTransactionState } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<OrderTransactionState, OrderTransactionState[]> = {
  open: ["in_progress", "unconfirmed", "authorized", "paid", "paid_partially", "reminded", "failed", "cancelled"],
  reminded: ["in_progress", "paid", "paid_partially", "failed", "cancelled"],
  in_progress: ["unconfirmed", "authorized", "paid", "paid_partially", "failed", "cancelled"],
  unconfirmed: ["authorized", "paid", "paid_partially", "failed", "cancelled"],
  authorized: ["paid", "paid_partially", "failed", "cancelled"],
  paid_partially: ["paid", "refunded", "cancelled"],
  paid: ["refunded"],
  // leaving failed/cancelled is only possible through an explicit reopen
  failed: ["open"],
  cancelled: ["open"],
  refunded: [],
};

const FAILURE_STATES: Set<OrderTransactionState> = new Set(["failed", "cancelled"]);

export function canTransition(current: OrderTransactionState, next: OrderTransactionState): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isFailureState(state: OrderTransactionState): boolean {
  return FAILURE_STATES.has(state);
}

export function assertTransition(current: OrderTransactionState, next: OrderTransactionState): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}
