import type { Pool } from "pg";
import type { AppPaymentMethodDescriptor, PaymentMethodRecord } from "../../domain/types.js";
import type { PaymentMethodRepositoryPort } from "../../ports/payment-method-repository.js";
import { mapTimestamp } from "./mapping.js";

export class PostgresPaymentMethodRepository implements PaymentMethodRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async savePaymentMethod(paymentMethod: PaymentMethodRecord): Promise<void> {
    const app = paymentMethod.app_payment_method;
    await this.pool.query(
      `
        INSERT INTO checkout_payment_methods (
          id,
          handler_identifier,
          active,
          app_id,
          app_name,
          app_identifier,
          app_active,
          created_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8::timestamptz)
        ON CONFLICT (id) DO UPDATE
        SET handler_identifier = EXCLUDED.handler_identifier,
            active = EXCLUDED.active,
            app_id = EXCLUDED.app_id,
            app_name = EXCLUDED.app_name,
            app_identifier = EXCLUDED.app_identifier,
            app_active = EXCLUDED.app_active
      `,
      [
        paymentMethod.id,
        paymentMethod.handler_identifier,
        paymentMethod.active,
        app?.app_id ?? null,
        app?.app_name ?? null,
        app?.identifier ?? null,
        app?.app_active ?? null,
        paymentMethod.created_at,
      ],
    );
  }

  async getPaymentMethodById(id: string): Promise<PaymentMethodRecord | null> {
    const result = await this.pool.query<{
      id: string;
      handler_identifier: string;
      active: boolean;
      app_id: string | null;
      app_name: string | null;
      app_identifier: string | null;
      app_active: boolean | null;
      created_at: unknown;
    }>(
      `
        SELECT id, handler_identifier, active, app_id, app_name, app_identifier, app_active, created_at
        FROM checkout_payment_methods
        WHERE id = $1
      `,
      [id],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const appPaymentMethod: AppPaymentMethodDescriptor | null =
      row.app_id !== null && row.app_name !== null && row.app_identifier !== null
        ? {
          app_id: row.app_id,
          app_name: row.app_name,
          identifier: row.app_identifier,
          app_active: row.app_active ?? false,
        }
        : null;

    return {
      id: row.id,
      handler_identifier: row.handler_identifier,
      active: row.active,
      app_payment_method: appPaymentMethod,
      created_at: mapTimestamp(row.created_at),
    };
  }
}
