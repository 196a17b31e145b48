import type { Pool, PoolClient } from "pg";
import type { OrderTransactionRecord, OrderTransactionState } from "../../domain/types.js";
import type {
  LockedOrderTransactions,
  OrderTransactionRepositoryPort,
} from "../../ports/order-transaction-repository.js";
import { advisoryLockId, mapTimestamp, toJsonObject, toNumber } from "./mapping.js";

interface OrderTransactionRow {
  id: string;
  order_id: string;
  payment_method_id: string;
  state: OrderTransactionState;
  amount: unknown;
  currency: string;
  custom_fields: unknown;
  created_at: unknown;
  updated_at: unknown;
}

const SELECT_COLUMNS = `
  id,
  order_id,
  payment_method_id,
  state,
  amount,
  currency,
  custom_fields,
  created_at,
  updated_at
`;

function mapRow(row: OrderTransactionRow): OrderTransactionRecord {
  return {
    id: row.id,
    order_id: row.order_id,
    payment_method_id: row.payment_method_id,
    state: row.state,
    amount: toNumber(row.amount, "amount"),
    currency: row.currency,
    custom_fields: toJsonObject(row.custom_fields, "custom_fields"),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

async function selectTransactionById(client: PoolClient, id: string): Promise<OrderTransactionRecord | null> {
  const result = await client.query<OrderTransactionRow>(
    `
      SELECT ${SELECT_COLUMNS}
      FROM checkout_order_transactions
      WHERE id = $1
    `,
    [id],
  );
  const row = result.rows[0];
  return row ? mapRow(row) : null;
}

async function upsertTransaction(client: PoolClient, transaction: OrderTransactionRecord): Promise<void> {
  await client.query(
    `
      INSERT INTO checkout_order_transactions (
        id,
        order_id,
        payment_method_id,
        state,
        amount,
        currency,
        custom_fields,
        created_at,
        updated_at
      )
      VALUES ($1, $2, $3, $4, $5::bigint, $6, $7::jsonb, $8::timestamptz, $9::timestamptz)
      ON CONFLICT (id) DO UPDATE
      SET state = EXCLUDED.state,
          custom_fields = EXCLUDED.custom_fields,
          updated_at = EXCLUDED.updated_at
    `,
    [
      transaction.id,
      transaction.order_id,
      transaction.payment_method_id,
      transaction.state,
      transaction.amount,
      transaction.currency,
      transaction.custom_fields === null ? null : JSON.stringify(transaction.custom_fields),
      transaction.created_at,
      transaction.updated_at,
    ],
  );
}

function lockedOn(client: PoolClient): LockedOrderTransactions {
  return {
    getTransactionById: (id) => selectTransactionById(client, id),
    saveTransaction: (transaction) => upsertTransaction(client, transaction),
  };
}

export class PostgresOrderTransactionRepository implements OrderTransactionRepositoryPort {
  constructor(private readonly pool: Pool) {}

  saveTransaction(transaction: OrderTransactionRecord): Promise<void> {
    return this.withClient((client) => upsertTransaction(client, transaction));
  }

  getTransactionById(id: string): Promise<OrderTransactionRecord | null> {
    return this.withClient((client) => selectTransactionById(client, id));
  }

  async findLatestByOrder(
    orderId: string,
    state: OrderTransactionState,
  ): Promise<OrderTransactionRecord | null> {
    const result = await this.pool.query<OrderTransactionRow>(
      `
        SELECT ${SELECT_COLUMNS}
        FROM checkout_order_transactions
        WHERE order_id = $1
          AND state = $2
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `,
      [orderId, state],
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  /**
   * Runs `operation` inside a database transaction holding a transaction-scoped advisory
   * lock. Reads and writes of the operation go through the same connection, so a waiting
   * lock never blocks the holder from getting a connection.
   */
  withTransactionLock<TOutput>(
    transactionId: string,
    operation: (locked: LockedOrderTransactions) => Promise<TOutput>,
  ): Promise<TOutput> {
    const lockKey = advisoryLockId("order_transaction", transactionId);
    return this.withClient(async (client) => {
      await client.query("BEGIN");
      try {
        await client.query("SELECT pg_advisory_xact_lock($1::bigint)", [lockKey.toString()]);
        const result = await operation(lockedOn(client));
        await client.query("COMMIT");
        return result;
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    });
  }

  private async withClient<TOutput>(work: (client: PoolClient) => Promise<TOutput>): Promise<TOutput> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }
}
