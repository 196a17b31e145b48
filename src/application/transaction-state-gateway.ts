import { randomUUID } from "node:crypto";
import { assertTransition, isFailureState } from "../domain/state-machine.js";
import {
  INITIAL_TRANSACTION_STATE,
  type CheckoutEvent,
  type OrderTransactionRecord,
  type OrderTransactionState,
  type PaymentContext,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import type { EventBusPort } from "../ports/event-bus.js";
import type { OrderTransactionRepositoryPort } from "../ports/order-transaction-repository.js";

const EVENT_TYPE_BY_STATE: Partial<Record<OrderTransactionState, CheckoutEvent["type"]>> = {
  in_progress: "order_transaction.in_progress",
  authorized: "order_transaction.authorized",
  paid: "order_transaction.paid",
  failed: "order_transaction.failed",
  cancelled: "order_transaction.cancelled",
  open: "order_transaction.open",
};

export class TransactionStateGateway {
  constructor(
    private readonly repository: OrderTransactionRepositoryPort,
    private readonly eventBus: EventBusPort,
    private readonly clock: ClockPort,
    private readonly eventSource: string,
  ) {}

  /**
   * The most recently created transaction of the order still in the initial state.
   */
  async currentFor(orderId: string): Promise<OrderTransactionRecord | null> {
    return this.repository.findLatestByOrder(orderId, INITIAL_TRANSACTION_STATE);
  }

  async getById(transactionId: string): Promise<OrderTransactionRecord | null> {
    return this.repository.getTransactionById(transactionId);
  }

  markFailed(transactionId: string, context: PaymentContext): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, "failed", context);
  }

  markCancelled(transactionId: string, context: PaymentContext): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, "cancelled", context);
  }

  markInProgress(transactionId: string, context: PaymentContext): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, "in_progress", context);
  }

  markAuthorized(transactionId: string, context: PaymentContext): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, "authorized", context);
  }

  markPaid(transactionId: string, context: PaymentContext): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, "paid", context);
  }

  /**
   * Moves the transaction into a failure state after a handler failed. A transaction the
   * handler already failed or cancelled is returned unchanged.
   */
  recordFailure(
    transactionId: string,
    next: "failed" | "cancelled",
    context: PaymentContext,
  ): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, next, context, { keepFailureState: true });
  }

  /**
   * Moves a failed or cancelled transaction back to the initial state. Payment flows never
   * call this.
   */
  reopen(transactionId: string, context: PaymentContext): Promise<OrderTransactionRecord> {
    return this.transition(transactionId, INITIAL_TRANSACTION_STATE, context);
  }

  private async transition(
    transactionId: string,
    next: OrderTransactionState,
    context: PaymentContext,
    options: { keepFailureState?: boolean } = {},
  ): Promise<OrderTransactionRecord> {
    return this.repository.withTransactionLock(transactionId, async (locked) => {
      const transaction = await locked.getTransactionById(transactionId);
      if (!transaction) {
        throw new AppError(404, "resource_not_found", `Order transaction '${transactionId}' not found.`);
      }

      const previous = transaction.state;
      if (options.keepFailureState && isFailureState(previous)) {
        return transaction;
      }
      assertTransition(previous, next);
      transaction.state = next;
      transaction.updated_at = this.clock.nowIso();
      await locked.saveTransaction(transaction);

      const eventType = EVENT_TYPE_BY_STATE[next];
      if (eventType) {
        await this.eventBus.publish({
          id: `evt_${randomUUID()}`,
          source: this.eventSource,
          type: eventType,
          occurred_at: this.clock.nowIso(),
          data: {
            order_transaction_id: transaction.id,
            order_id: transaction.order_id,
            from: previous,
            to: next,
            context_source: context.source,
          },
        });
      }
      return transaction;
    });
  }
}
