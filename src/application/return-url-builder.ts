import type { OrderTransactionRecord, SalesChannelContext } from "../domain/types.js";
import type { PaymentTokenFactory } from "../infra/payment-token.js";
import { PAYMENT_FINALIZE_ROUTE } from "../infra/url-generator.js";
import type { SystemConfigPort } from "../ports/system-config.js";
import type { UrlGeneratorPort } from "../ports/url-generator.js";

export const FINALIZE_TRANSACTION_TIME_KEY = "checkout.payment.finalizeTransactionTime";
export const PAYMENT_TOKEN_PARAMETER = "payment_token";

/**
 * Minutes from channel configuration to seconds; anything non-numeric counts as unset.
 */
export function finalizeWindowSeconds(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) * 60 : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? Math.trunc(parsed) * 60 : null;
  }
  return null;
}

export class PaymentReturnUrlBuilder {
  constructor(
    private readonly tokenFactory: PaymentTokenFactory,
    private readonly systemConfig: SystemConfigPort,
    private readonly urlGenerator: UrlGeneratorPort,
  ) {}

  async build(
    transaction: OrderTransactionRecord,
    finishUrl: string | null,
    errorUrl: string | null,
    salesChannelContext: SalesChannelContext,
  ): Promise<string> {
    const configured = await this.systemConfig.get(
      FINALIZE_TRANSACTION_TIME_KEY,
      salesChannelContext.salesChannelId,
    );

    const token = await this.tokenFactory.generateToken({
      paymentMethodId: transaction.payment_method_id,
      transactionId: transaction.id,
      finishUrl,
      errorUrl,
      expiresInSeconds: finalizeWindowSeconds(configured),
    });

    return this.urlGenerator.absolute(PAYMENT_FINALIZE_ROUTE, { [PAYMENT_TOKEN_PARAMETER]: token });
  }
}
