import type {
  PaymentContext,
  PaymentRedirect,
  PaymentRequest,
  PaymentToken,
  PaymentTokenResult,
  RequestDataBag,
  SalesChannelContext,
} from "../domain/types.js";

export interface LegacyPaymentFlowPort {
  process(
    orderId: string,
    dataBag: RequestDataBag,
    salesChannelContext: SalesChannelContext,
    finishUrl: string | null,
    errorUrl: string | null,
  ): Promise<PaymentRedirect | null>;
  /**
   * Does not invalidate the token; the caller owns its lifetime.
   */
  finalizeTransaction(
    token: PaymentToken,
    request: PaymentRequest,
    salesChannelContext: SalesChannelContext,
  ): Promise<PaymentTokenResult>;
  processRecurring(orderId: string, context: PaymentContext): Promise<void>;
}
