import type { OrderTransactionRecord, PaymentTransactionView, PaymentValidationData } from "../domain/types.js";

export interface PaymentTransactionViewFactory {
  build(transactionId: string, returnUrl?: string | null): PaymentTransactionView;
}

export class DefaultPaymentTransactionViewFactory implements PaymentTransactionViewFactory {
  build(transactionId: string, returnUrl: string | null = null): PaymentTransactionView {
    return { orderTransactionId: transactionId, returnUrl };
  }
}

/**
 * Data a handler produced while the cart was validated, stashed on the transaction.
 */
export function validateStructOf(transaction: OrderTransactionRecord): PaymentValidationData {
  const value = transaction.custom_fields?.validateStruct;
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}
