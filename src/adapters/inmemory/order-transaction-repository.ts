import type { OrderTransactionRecord, OrderTransactionState } from "../../domain/types.js";
import { KeyedLock } from "../../infra/keyed-lock.js";
import type {
  LockedOrderTransactions,
  OrderTransactionRepositoryPort,
} from "../../ports/order-transaction-repository.js";

export class InMemoryOrderTransactionRepository implements OrderTransactionRepositoryPort {
  private readonly transactions = new Map<string, OrderTransactionRecord>();
  private readonly lock = new KeyedLock();

  async saveTransaction(transaction: OrderTransactionRecord): Promise<void> {
    this.transactions.set(transaction.id, { ...transaction });
  }

  async getTransactionById(id: string): Promise<OrderTransactionRecord | null> {
    const transaction = this.transactions.get(id);
    return transaction ? { ...transaction } : null;
  }

  async findLatestByOrder(
    orderId: string,
    state: OrderTransactionState,
  ): Promise<OrderTransactionRecord | null> {
    const [latest] = [...this.transactions.values()]
      .filter((transaction) => transaction.order_id === orderId && transaction.state === state)
      .sort((a, b) => {
        const byCreatedAt = b.created_at.localeCompare(a.created_at);
        if (byCreatedAt !== 0) {
          return byCreatedAt;
        }
        return b.id.localeCompare(a.id);
      });
    return latest ? { ...latest } : null;
  }

  withTransactionLock<TOutput>(
    transactionId: string,
    operation: (locked: LockedOrderTransactions) => Promise<TOutput>,
  ): Promise<TOutput> {
    return this.lock.run(transactionId, () => operation(this));
  }
}
