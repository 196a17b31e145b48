import type {
  CartSnapshot,
  OrderTransactionRecord,
  PaymentContext,
  PaymentRedirect,
  PaymentRequest,
  PaymentTransactionView,
  PaymentValidationData,
  RequestDataBag,
  SalesChannelContext,
} from "../domain/types.js";

/**
 * Unified handler contract. A handler that completes synchronously returns `null` from
 * `pay`; one that needs an external step returns the redirect and is resumed through
 * `finalize` once the customer comes back.
 */
export interface ModernPaymentHandler {
  readonly kind: "modern";
  pay(
    request: PaymentRequest,
    transaction: PaymentTransactionView,
    context: PaymentContext,
    validateStruct: PaymentValidationData,
  ): Promise<PaymentRedirect | null>;
  finalize(request: PaymentRequest, transaction: PaymentTransactionView, context: PaymentContext): Promise<void>;
  validate(
    cart: CartSnapshot,
    dataBag: RequestDataBag,
    context: SalesChannelContext,
  ): Promise<PaymentValidationData | null>;
  recurring(transaction: PaymentTransactionView, context: PaymentContext): Promise<void>;
}

export interface LegacyPaymentTransaction {
  orderTransaction: OrderTransactionRecord;
  returnUrl: string | null;
}

interface LegacyRecurringCapability {
  captureRecurring?(transaction: LegacyPaymentTransaction, context: PaymentContext): Promise<void>;
}

export interface LegacySynchronousPaymentHandler extends LegacyRecurringCapability {
  readonly kind: "legacy_sync";
  pay(transaction: LegacyPaymentTransaction, dataBag: RequestDataBag, context: SalesChannelContext): Promise<void>;
}

export interface LegacyAsynchronousPaymentHandler extends LegacyRecurringCapability {
  readonly kind: "legacy_async";
  pay(
    transaction: LegacyPaymentTransaction,
    dataBag: RequestDataBag,
    context: SalesChannelContext,
  ): Promise<PaymentRedirect>;
  finalize(
    transaction: LegacyPaymentTransaction,
    request: PaymentRequest,
    context: SalesChannelContext,
  ): Promise<void>;
}

export interface LegacyPreparedPaymentHandler extends LegacyRecurringCapability {
  readonly kind: "legacy_prepared";
  validate(
    cart: CartSnapshot,
    dataBag: RequestDataBag,
    context: SalesChannelContext,
  ): Promise<PaymentValidationData>;
  capture(
    transaction: LegacyPaymentTransaction,
    dataBag: RequestDataBag,
    context: SalesChannelContext,
    preOrderPaymentStruct: PaymentValidationData,
  ): Promise<void>;
}

export type LegacyPaymentHandler =
  | LegacySynchronousPaymentHandler
  | LegacyAsynchronousPaymentHandler
  | LegacyPreparedPaymentHandler;

export type PaymentHandler = ModernPaymentHandler | LegacyPaymentHandler;

export interface PaymentHandlerCapabilities {
  supportsModern: boolean;
  supportsPreparedValidation: boolean;
  supportsRecurring: boolean;
}

export type ResolvedPaymentHandler =
  | {
    generation: "modern";
    paymentMethodId: string;
    handler: ModernPaymentHandler;
    capabilities: PaymentHandlerCapabilities;
  }
  | {
    generation: "legacy";
    paymentMethodId: string;
    handler: LegacyPaymentHandler;
    capabilities: PaymentHandlerCapabilities;
  };

export interface PaymentHandlerResolverPort {
  resolve(paymentMethodId: string): Promise<ResolvedPaymentHandler | null>;
}
