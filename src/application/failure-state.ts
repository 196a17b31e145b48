import { isCustomerCanceled, toError } from "../domain/payment-errors.js";
import type { PaymentContext } from "../domain/types.js";
import type { Logger } from "../infra/logger.js";
import type { TransactionStateGateway } from "./transaction-state-gateway.js";

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Moves the transaction into `next` after a handler failure. The handler's error is the
 * one callers report, so a transition the state machine refuses (the handler already paid,
 * say) is logged and dropped.
 */
export async function applyFailureState(
  transactionId: string,
  next: "failed" | "cancelled",
  transactions: TransactionStateGateway,
  logger: Logger,
  context: PaymentContext,
): Promise<void> {
  try {
    await transactions.recordFailure(transactionId, next, context);
  } catch (error) {
    logger.error(
      { orderTransactionId: transactionId, targetState: next, exceptionMessage: errorMessageOf(error), err: error },
      "Could not move the order transaction into its failure state",
    );
  }
}

/**
 * Applies the state change for a failed finalize call and returns the error to attach to
 * the token result. A customer cancelling at the provider cancels the transaction; any
 * other failure is logged and fails it.
 */
export async function recordFinalizeFailure(
  thrown: unknown,
  transactionId: string,
  transactions: TransactionStateGateway,
  logger: Logger,
  context: PaymentContext,
): Promise<Error> {
  const exception = toError(thrown, transactionId);
  if (isCustomerCanceled(exception)) {
    await applyFailureState(transactionId, "cancelled", transactions, logger, context);
    return exception;
  }

  logger.error(
    { orderTransactionId: transactionId, exceptionMessage: exception.message, err: exception },
    "An error occurred during finalizing async payment",
  );
  await applyFailureState(transactionId, "failed", transactions, logger, context);
  return exception;
}
