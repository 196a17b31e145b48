import {
  asyncProcessInterrupted,
  invalidOrder,
  recurringInterrupted,
  unknownPaymentMethodById,
} from "../domain/payment-errors.js";
import type {
  OrderTransactionRecord,
  PaymentContext,
  PaymentRedirect,
  PaymentToken,
  PaymentTokenResult,
  RequestDataBag,
  PaymentRequest,
  SalesChannelContext,
} from "../domain/types.js";
import type { Logger } from "../infra/logger.js";
import type { LegacyPaymentFlowPort } from "../ports/legacy-payment-flow.js";
import type { PaymentHandlerResolverPort, ResolvedPaymentHandler } from "../ports/payment-handler.js";
import { recordFinalizeFailure } from "./failure-state.js";
import { validateStructOf } from "./payment-transaction-view-factory.js";
import type { PaymentReturnUrlBuilder } from "./return-url-builder.js";
import type { TransactionStateGateway } from "./transaction-state-gateway.js";

type ResolvedLegacyHandler = Extract<ResolvedPaymentHandler, { generation: "legacy" }>;

/**
 * Drives handlers written against the previous handler generation. Kept apart from
 * {@link PaymentProcessor} so the deprecated protocol can be removed in one place.
 */
export class LegacyPaymentFlow implements LegacyPaymentFlowPort {
  constructor(
    private readonly handlers: PaymentHandlerResolverPort,
    private readonly transactions: TransactionStateGateway,
    private readonly returnUrlBuilder: PaymentReturnUrlBuilder,
    private readonly logger: Logger,
  ) {}

  async process(
    orderId: string,
    dataBag: RequestDataBag,
    salesChannelContext: SalesChannelContext,
    finishUrl: string | null,
    errorUrl: string | null,
  ): Promise<PaymentRedirect | null> {
    const transaction = await this.transactions.currentFor(orderId);
    if (!transaction) {
      throw invalidOrder(orderId);
    }
    const { handler } = await this.resolveLegacyHandler(transaction);

    switch (handler.kind) {
      case "legacy_sync":
        await handler.pay({ orderTransaction: transaction, returnUrl: null }, dataBag, salesChannelContext);
        return null;
      case "legacy_async": {
        const returnUrl = await this.returnUrlBuilder.build(transaction, finishUrl, errorUrl, salesChannelContext);
        return handler.pay({ orderTransaction: transaction, returnUrl }, dataBag, salesChannelContext);
      }
      case "legacy_prepared":
        await handler.capture(
          { orderTransaction: transaction, returnUrl: null },
          dataBag,
          salesChannelContext,
          validateStructOf(transaction),
        );
        return null;
    }
  }

  async finalizeTransaction(
    token: PaymentToken,
    request: PaymentRequest,
    salesChannelContext: SalesChannelContext,
  ): Promise<PaymentTokenResult> {
    const transactionId = token.transactionId;
    if (transactionId === null) {
      throw asyncProcessInterrupted("", "payment token did not contain an order transaction id");
    }
    const resolved = token.paymentMethodId === null ? null : await this.handlers.resolve(token.paymentMethodId);
    if (!resolved || resolved.generation !== "legacy" || resolved.handler.kind !== "legacy_async") {
      throw asyncProcessInterrupted(transactionId, "payment handler does not support asynchronous payments");
    }
    const handler = resolved.handler;

    const transaction = await this.transactions.getById(transactionId);
    if (!transaction) {
      throw asyncProcessInterrupted(transactionId, "order transaction could not be found");
    }

    try {
      await handler.finalize({ orderTransaction: transaction, returnUrl: null }, request, salesChannelContext);
      return { ...token, exception: null };
    } catch (error) {
      const exception = await recordFinalizeFailure(
        error,
        transactionId,
        this.transactions,
        this.logger,
        salesChannelContext.context,
      );
      return { ...token, exception };
    }
  }

  async processRecurring(orderId: string, context: PaymentContext): Promise<void> {
    const transaction = await this.transactions.currentFor(orderId);
    if (!transaction) {
      throw invalidOrder(orderId);
    }
    const { handler, capabilities } = await this.resolveLegacyHandler(transaction);
    if (!capabilities.supportsRecurring || !handler.captureRecurring) {
      throw recurringInterrupted(transaction.id, "payment handler does not support recurring payments");
    }
    await handler.captureRecurring({ orderTransaction: transaction, returnUrl: null }, context);
  }

  private async resolveLegacyHandler(transaction: OrderTransactionRecord): Promise<ResolvedLegacyHandler> {
    const resolved = await this.handlers.resolve(transaction.payment_method_id);
    if (!resolved || resolved.generation !== "legacy") {
      throw unknownPaymentMethodById(transaction.payment_method_id);
    }
    return resolved;
  }
}
