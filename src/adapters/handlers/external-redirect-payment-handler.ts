import { randomUUID } from "node:crypto";
import { asyncProcessInterrupted, customerCanceled, paymentProcessError } from "../../domain/payment-errors.js";
import type {
  CartSnapshot,
  PaymentContext,
  PaymentRedirect,
  PaymentRequest,
  PaymentTransactionView,
  PaymentValidationData,
} from "../../domain/types.js";
import type { TransactionStateGateway } from "../../application/transaction-state-gateway.js";
import type { ModernPaymentHandler } from "../../ports/payment-handler.js";

export const EXTERNAL_REDIRECT_PAYMENT_HANDLER = "external_redirect";

interface ExternalRedirectPaymentHandlerOptions {
  checkoutUrl: string;
}

/**
 * Stand-in for a hosted payment page. The customer is sent to `checkoutUrl` and comes back
 * through the return URL; the `status` query parameter of that callback decides the
 * outcome (`cancel`, `fail`, anything else pays).
 */
export class ExternalRedirectPaymentHandler implements ModernPaymentHandler {
  readonly kind = "modern";

  constructor(
    private readonly transactions: TransactionStateGateway,
    private readonly options: ExternalRedirectPaymentHandlerOptions,
  ) {}

  async pay(
    _request: PaymentRequest,
    transaction: PaymentTransactionView,
    context: PaymentContext,
  ): Promise<PaymentRedirect | null> {
    if (transaction.returnUrl === null) {
      throw asyncProcessInterrupted(transaction.orderTransactionId, "a return URL is required");
    }
    await this.transactions.markInProgress(transaction.orderTransactionId, context);

    const url = new URL(this.options.checkoutUrl);
    url.searchParams.set("session", `sess_${randomUUID()}`);
    url.searchParams.set("return_url", transaction.returnUrl);
    return { url: url.toString() };
  }

  async finalize(request: PaymentRequest, transaction: PaymentTransactionView, context: PaymentContext): Promise<void> {
    const status = request.query.status;
    if (status === "cancel") {
      throw customerCanceled(transaction.orderTransactionId, "customer aborted on the payment page");
    }
    if (status === "fail") {
      throw paymentProcessError(transaction.orderTransactionId, "payment was declined by the provider");
    }
    await this.transactions.markPaid(transaction.orderTransactionId, context);
  }

  async validate(cart: CartSnapshot): Promise<PaymentValidationData | null> {
    if (cart.total_price <= 0) {
      return null;
    }
    return { cart_token: cart.token, amount: cart.total_price, currency: cart.currency };
  }

  async recurring(transaction: PaymentTransactionView, context: PaymentContext): Promise<void> {
    await this.transactions.markPaid(transaction.orderTransactionId, context);
  }
}
