export type OrderTransactionState =
  | "open"
  | "in_progress"
  | "unconfirmed"
  | "authorized"
  | "paid"
  | "paid_partially"
  | "reminded"
  | "failed"
  | "cancelled"
  | "refunded";

export const INITIAL_TRANSACTION_STATE: OrderTransactionState = "open";

export interface OrderTransactionRecord {
  id: string;
  order_id: string;
  payment_method_id: string;
  state: OrderTransactionState;
  amount: number;
  currency: string;
  custom_fields: Record<string, unknown> | null;
  created_at: string;
  updated_at: string;
}

export interface AppPaymentMethodDescriptor {
  app_id: string;
  app_name: string;
  identifier: string;
  app_active: boolean;
}

export interface PaymentMethodRecord {
  id: string;
  handler_identifier: string;
  active: boolean;
  app_payment_method: AppPaymentMethodDescriptor | null;
  created_at: string;
}

export type ContextSource = "storefront" | "admin_api" | "system";

/**
 * Channel-independent execution context handed to handlers and the state gateway.
 */
export interface PaymentContext {
  source: ContextSource;
  salesChannelId: string | null;
}

export interface CustomerReference {
  id: string;
}

/**
 * Customer-facing context of a storefront request: channel, selected payment method and
 * the authenticated customer, if any.
 */
export interface SalesChannelContext {
  salesChannelId: string;
  paymentMethodId: string;
  customer: CustomerReference | null;
  context: PaymentContext;
}

export interface PaymentRequest {
  query: Record<string, string | undefined>;
  body: Record<string, unknown>;
}

export type RequestDataBag = Record<string, unknown>;

export interface CartLineItem {
  id: string;
  quantity: number;
  unit_price: number;
}

export interface CartSnapshot {
  token: string;
  currency: string;
  total_price: number;
  line_items: CartLineItem[];
}

export type PaymentValidationData = Record<string, unknown>;

export interface PaymentRedirect {
  url: string;
}

export interface PaymentTransactionView {
  orderTransactionId: string;
  returnUrl: string | null;
}

export interface PaymentTokenPayload {
  paymentMethodId: string | null;
  transactionId: string | null;
  finishUrl: string | null;
  errorUrl: string | null;
  expiresInSeconds: number | null;
}

export interface PaymentToken {
  id: string;
  token: string;
  paymentMethodId: string | null;
  transactionId: string | null;
  finishUrl: string | null;
  errorUrl: string | null;
  issuedAt: number;
  expiresAt: number;
  expired: boolean;
}

export interface PaymentTokenResult extends PaymentToken {
  exception: Error | null;
}

export interface CheckoutEvent {
  id: string;
  source: string;
  type:
    | "order_transaction.in_progress"
    | "order_transaction.authorized"
    | "order_transaction.paid"
    | "order_transaction.failed"
    | "order_transaction.cancelled"
    | "order_transaction.open";
  occurred_at: string;
  data: Record<string, unknown>;
}
