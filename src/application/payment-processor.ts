import {
  appendErrorCode,
  asyncProcessInterrupted,
  invalidOrder,
  invalidToken,
  payRedirectErrorCode,
  tokenExpired,
  unknownPaymentMethodById,
} from "../domain/payment-errors.js";
import type {
  CartSnapshot,
  PaymentContext,
  PaymentRedirect,
  PaymentRequest,
  PaymentTokenResult,
  PaymentValidationData,
  RequestDataBag,
  SalesChannelContext,
} from "../domain/types.js";
import type { Logger } from "../infra/logger.js";
import type { PaymentTokenFactory } from "../infra/payment-token.js";
import type { LegacyPaymentFlowPort } from "../ports/legacy-payment-flow.js";
import type { PaymentHandlerResolverPort } from "../ports/payment-handler.js";
import { applyFailureState, errorMessageOf, recordFinalizeFailure } from "./failure-state.js";
import {
  DefaultPaymentTransactionViewFactory,
  validateStructOf,
  type PaymentTransactionViewFactory,
} from "./payment-transaction-view-factory.js";
import type { PaymentReturnUrlBuilder } from "./return-url-builder.js";
import type { TransactionStateGateway } from "./transaction-state-gateway.js";

interface PaymentProcessorDependencies {
  handlers: PaymentHandlerResolverPort;
  transactions: TransactionStateGateway;
  tokenFactory: PaymentTokenFactory;
  returnUrlBuilder: PaymentReturnUrlBuilder;
  legacyFlow: LegacyPaymentFlowPort;
  logger: Logger;
  viewFactory?: PaymentTransactionViewFactory;
}

/**
 * Runs the payment lifecycle of an order transaction across pluggable handlers:
 * starting a payment, resuming it after an external step, validating the cart before the
 * order exists, and charging recurring orders.
 */
export class PaymentProcessor {
  private readonly handlers: PaymentHandlerResolverPort;
  private readonly transactions: TransactionStateGateway;
  private readonly tokenFactory: PaymentTokenFactory;
  private readonly returnUrlBuilder: PaymentReturnUrlBuilder;
  private readonly legacyFlow: LegacyPaymentFlowPort;
  private readonly logger: Logger;
  private readonly viewFactory: PaymentTransactionViewFactory;

  constructor(dependencies: PaymentProcessorDependencies) {
    this.handlers = dependencies.handlers;
    this.transactions = dependencies.transactions;
    this.tokenFactory = dependencies.tokenFactory;
    this.returnUrlBuilder = dependencies.returnUrlBuilder;
    this.legacyFlow = dependencies.legacyFlow;
    this.logger = dependencies.logger;
    this.viewFactory = dependencies.viewFactory ?? new DefaultPaymentTransactionViewFactory();
  }

  /**
   * Starts the payment of the order's open transaction. Returns the redirect the customer
   * has to follow, or `null` when the handler completed the payment right away.
   *
   * Handler failures mark the transaction failed. With an `errorUrl` they turn into a
   * redirect carrying an `error-code` parameter; without one they are rethrown.
   */
  async pay(
    orderId: string,
    request: PaymentRequest,
    salesChannelContext: SalesChannelContext,
    finishUrl: string | null = null,
    errorUrl: string | null = null,
  ): Promise<PaymentRedirect | null> {
    const transaction = await this.transactions.currentFor(orderId);
    if (!transaction) {
      throw invalidOrder(orderId);
    }

    try {
      const resolved = await this.handlers.resolve(transaction.payment_method_id);
      if (!resolved) {
        throw unknownPaymentMethodById(transaction.payment_method_id);
      }

      if (resolved.generation === "legacy") {
        return await this.legacyFlow.process(orderId, request.body, salesChannelContext, finishUrl, errorUrl);
      }

      const returnUrl = await this.returnUrlBuilder.build(transaction, finishUrl, errorUrl, salesChannelContext);
      const view = this.viewFactory.build(transaction.id, returnUrl);
      return await resolved.handler.pay(request, view, salesChannelContext.context, validateStructOf(transaction));
    } catch (error) {
      this.logger.error(
        { orderTransactionId: transaction.id, exceptionMessage: errorMessageOf(error) },
        "An error occurred during processing the payment",
      );
      await applyFailureState(transaction.id, "failed", this.transactions, this.logger, salesChannelContext.context);

      if (errorUrl !== null) {
        return { url: appendErrorCode(errorUrl, payRedirectErrorCode(error)) };
      }
      throw error;
    }
  }

  /**
   * Resumes a payment when the customer returns from the external step. Handler failures
   * are attached to the result instead of thrown. The token is invalidated on every path
   * once it has been parsed.
   */
  async finalize(
    paymentToken: string,
    request: PaymentRequest,
    salesChannelContext: SalesChannelContext,
  ): Promise<PaymentTokenResult> {
    return this.tokenFactory.withTokenLock(paymentToken, async () => {
      const token = await this.tokenFactory.parseToken(paymentToken);

      try {
        if (token.expired) {
          return { ...token, exception: tokenExpired(token.id) };
        }
        if (token.paymentMethodId === null) {
          throw invalidToken("token did not contain a payment method id.");
        }
        const transactionId = token.transactionId;
        if (transactionId === null) {
          throw asyncProcessInterrupted(token.id, "payment token did not contain an order transaction id");
        }

        const resolved = await this.handlers.resolve(token.paymentMethodId);
        if (!resolved) {
          throw unknownPaymentMethodById(token.paymentMethodId);
        }
        if (resolved.generation === "legacy") {
          return await this.legacyFlow.finalizeTransaction(token, request, salesChannelContext);
        }

        try {
          await resolved.handler.finalize(request, this.viewFactory.build(transactionId), salesChannelContext.context);
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
      } finally {
        await this.tokenFactory.invalidateToken(token.token);
      }
    });
  }

  /**
   * Lets the selected handler check the cart before the order is placed. Handlers without
   * a validation step yield `null`.
   */
  async validate(
    cart: CartSnapshot,
    dataBag: RequestDataBag,
    salesChannelContext: SalesChannelContext,
  ): Promise<PaymentValidationData | null> {
    try {
      const resolved = await this.handlers.resolve(salesChannelContext.paymentMethodId);
      if (!resolved) {
        throw unknownPaymentMethodById(salesChannelContext.paymentMethodId);
      }
      const { capabilities } = resolved;
      if (!capabilities.supportsPreparedValidation && !capabilities.supportsModern) {
        return null;
      }

      if (resolved.generation === "modern") {
        return await resolved.handler.validate(cart, dataBag, salesChannelContext);
      }
      if (resolved.handler.kind === "legacy_prepared") {
        return await resolved.handler.validate(cart, dataBag, salesChannelContext);
      }
      return null;
    } catch (error) {
      this.logger.error(
        { customerId: salesChannelContext.customer?.id ?? "", exceptionMessage: errorMessageOf(error) },
        "An error occurred during processing the validation of the payment. The order has not been placed yet.",
      );
      throw error;
    }
  }

  /**
   * Charges the open transaction of a recurring order without customer interaction.
   */
  async recurring(orderId: string, context: PaymentContext): Promise<void> {
    const transaction = await this.transactions.currentFor(orderId);
    if (!transaction) {
      throw invalidOrder(orderId);
    }

    try {
      const resolved = await this.handlers.resolve(transaction.payment_method_id);
      if (!resolved) {
        throw unknownPaymentMethodById(transaction.payment_method_id);
      }

      if (resolved.generation === "legacy") {
        await this.legacyFlow.processRecurring(orderId, context);
        return;
      }

      await resolved.handler.recurring(this.viewFactory.build(transaction.id), context);
    } catch (error) {
      this.logger.error(
        { orderTransactionId: transaction.id, exceptionMessage: errorMessageOf(error) },
        "An error occurred during processing the payment",
      );
      await applyFailureState(transaction.id, "failed", this.transactions, this.logger, context);
      throw error;
    }
  }
}
