import type { LegacySynchronousPaymentHandler } from "../../ports/payment-handler.js";

export const INVOICE_PAYMENT_HANDLER = "invoice";

export class InvoicePaymentHandler implements LegacySynchronousPaymentHandler {
  readonly kind = "legacy_sync";

  async pay(): Promise<void> {}
}
