import { AppError } from "../infra/app-error.js";

export const PAYMENT_INVALID_ORDER = "payment_invalid_order";
export const PAYMENT_UNKNOWN_PAYMENT_METHOD = "payment_unknown_payment_method";
export const PAYMENT_INVALID_TOKEN = "payment_invalid_token";
export const PAYMENT_TOKEN_EXPIRED = "payment_token_expired";
export const PAYMENT_ASYNC_PROCESS_INTERRUPTED = "payment_async_process_interrupted";
export const PAYMENT_CUSTOMER_CANCELED_EXTERNAL = "payment_customer_canceled_external";
export const PAYMENT_PROCESS_ERROR = "payment_process_error";
export const PAYMENT_RECURRING_INTERRUPTED = "payment_recurring_interrupted";

export function invalidOrder(orderId: string): AppError {
  return new AppError(
    404,
    PAYMENT_INVALID_ORDER,
    `The order with id ${orderId} is invalid or could not be found.`,
  );
}

export function unknownPaymentMethodById(paymentMethodId: string): AppError {
  return new AppError(
    400,
    PAYMENT_UNKNOWN_PAYMENT_METHOD,
    `The payment method ${paymentMethodId} could not be found.`,
  );
}

export function invalidToken(reason: string): AppError {
  return new AppError(400, PAYMENT_INVALID_TOKEN, `The provided payment token is invalid: ${reason}`);
}

export function tokenExpired(tokenId: string): AppError {
  return new AppError(410, PAYMENT_TOKEN_EXPIRED, `The provided payment token ${tokenId} has expired.`);
}

export function asyncProcessInterrupted(transactionId: string, message: string): AppError {
  return new AppError(
    400,
    PAYMENT_ASYNC_PROCESS_INTERRUPTED,
    `The asynchronous payment process was interrupted for transaction ${transactionId}: ${message}`,
  );
}

export function customerCanceled(transactionId: string, message: string): AppError {
  return new AppError(
    400,
    PAYMENT_CUSTOMER_CANCELED_EXTERNAL,
    `The customer canceled the external payment process for transaction ${transactionId}: ${message}`,
  );
}

export function paymentProcessError(transactionId: string, message: string): AppError {
  return new AppError(
    400,
    PAYMENT_PROCESS_ERROR,
    `The payment process was interrupted for transaction ${transactionId}: ${message}`,
  );
}

export function recurringInterrupted(transactionId: string, message: string): AppError {
  return new AppError(
    400,
    PAYMENT_RECURRING_INTERRUPTED,
    `The recurring capture process was interrupted for transaction ${transactionId}: ${message}`,
  );
}

export function isCustomerCanceled(error: unknown): boolean {
  return error instanceof AppError && error.code === PAYMENT_CUSTOMER_CANCELED_EXTERNAL;
}

export function toError(thrown: unknown, transactionId: string): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return paymentProcessError(transactionId, String(thrown));
}

/**
 * Value of the `error-code` parameter appended when `pay` redirects to an error target.
 */
export function payRedirectErrorCode(error: unknown): string {
  return error instanceof AppError ? String(error.statusCode) : PAYMENT_PROCESS_ERROR;
}

/**
 * Value of the `error-code` parameter appended when the finalize callback redirects to an
 * error target.
 */
export function finalizeRedirectErrorCode(error: Error): string {
  return error instanceof AppError ? error.code : PAYMENT_PROCESS_ERROR;
}

export function appendErrorCode(url: string, errorCode: string): string {
  const hashIndex = url.indexOf("#");
  const base = hashIndex >= 0 ? url.slice(0, hashIndex) : url;
  const fragment = hashIndex >= 0 ? url.slice(hashIndex) : "";
  const queryIndex = base.indexOf("?");
  const parameter = `error-code=${encodeURIComponent(errorCode)}`;

  if (queryIndex < 0) {
    return `${base}?${parameter}${fragment}`;
  }
  if (queryIndex === base.length - 1) {
    return `${base}${parameter}${fragment}`;
  }
  return `${base}&${parameter}${fragment}`;
}
