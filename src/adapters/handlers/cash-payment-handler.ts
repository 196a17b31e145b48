import { recurringInterrupted } from "../../domain/payment-errors.js";
import type { PaymentRedirect, PaymentTransactionView, PaymentValidationData } from "../../domain/types.js";
import type { ModernPaymentHandler } from "../../ports/payment-handler.js";

export const CASH_PAYMENT_HANDLER = "cash";

/**
 * Payment collected outside the shop (cash on delivery, pay at pickup). The transaction
 * stays open until someone books the money.
 */
export class CashPaymentHandler implements ModernPaymentHandler {
  readonly kind = "modern";

  async pay(): Promise<PaymentRedirect | null> {
    return null;
  }

  async finalize(): Promise<void> {}

  async validate(): Promise<PaymentValidationData | null> {
    return null;
  }

  async recurring(transaction: PaymentTransactionView): Promise<void> {
    throw recurringInterrupted(transaction.orderTransactionId, "cash payments cannot be charged automatically");
  }
}
