import type { OrderTransactionRecord, OrderTransactionState } from "../domain/types.js";

/**
 * Reads and writes bound to the connection that holds a transaction lock.
 */
export interface LockedOrderTransactions {
  getTransactionById(id: string): Promise<OrderTransactionRecord | null>;
  saveTransaction(transaction: OrderTransactionRecord): Promise<void>;
}

export interface OrderTransactionRepositoryPort extends LockedOrderTransactions {
  /**
   * Most recently created transaction of the order in the given state.
   */
  findLatestByOrder(orderId: string, state: OrderTransactionState): Promise<OrderTransactionRecord | null>;
  withTransactionLock<TOutput>(
    transactionId: string,
    operation: (locked: LockedOrderTransactions) => Promise<TOutput>,
  ): Promise<TOutput>;
}
