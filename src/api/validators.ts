import type { CartLineItem, CartSnapshot, RequestDataBag } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

export interface PayOrderInput {
  finish_url?: string;
  error_url?: string;
  data?: RequestDataBag;
}

export interface ValidatePaymentInput {
  cart: CartSnapshot;
  data?: RequestDataBag;
}

function assertOptionalRedirectUrl(value: unknown, fieldName: string): void {
  if (value === undefined) {
    return;
  }
  if (!isString(value) || !isAbsoluteHttpUrl(value)) {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be an absolute http(s) URL.`);
  }
}

function assertOptionalDataBag(value: unknown): void {
  if (value !== undefined && !isObject(value)) {
    throw new AppError(422, "invalid_data", "data must be an object.");
  }
}

function isCartLineItem(value: unknown): value is CartLineItem {
  return (
    isObject(value)
    && isString(value.id)
    && typeof value.quantity === "number"
    && Number.isInteger(value.quantity)
    && value.quantity > 0
    && typeof value.unit_price === "number"
    && Number.isInteger(value.unit_price)
    && value.unit_price >= 0
  );
}

export function assertPayOrderInput(payload: unknown): asserts payload is PayOrderInput | undefined {
  if (payload === undefined) {
    return;
  }
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  assertOptionalRedirectUrl(payload.finish_url, "finish_url");
  assertOptionalRedirectUrl(payload.error_url, "error_url");
  assertOptionalDataBag(payload.data);
}

export function assertValidatePaymentInput(payload: unknown): asserts payload is ValidatePaymentInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  const { cart } = payload;
  if (!isObject(cart) || !isString(cart.token)) {
    throw new AppError(422, "invalid_cart", "cart.token is required.");
  }
  if (!isString(cart.currency) || cart.currency.length !== 3) {
    throw new AppError(422, "invalid_cart", "cart.currency must be a 3-letter ISO code.");
  }
  if (typeof cart.total_price !== "number" || !Number.isInteger(cart.total_price) || cart.total_price < 0) {
    throw new AppError(422, "invalid_cart", "cart.total_price must be a non-negative integer.");
  }
  if (!Array.isArray(cart.line_items) || !cart.line_items.every(isCartLineItem)) {
    throw new AppError(422, "invalid_cart", "cart.line_items must be a list of line items.");
  }
  assertOptionalDataBag(payload.data);
}

export function normalizeResourceId(value: unknown, fieldName: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new AppError(422, `invalid_${fieldName}`, `${fieldName} must be a string.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}

export function requireResourceId(value: unknown, fieldName: string): string {
  const normalized = normalizeResourceId(value, fieldName);
  if (normalized === undefined) {
    throw new AppError(400, `missing_${fieldName}`, `${fieldName} is required.`);
  }
  return normalized;
}

export function requirePaymentToken(value: unknown): string {
  if (!isString(value)) {
    throw new AppError(400, "missing_payment_token", "payment_token query parameter is required.");
  }
  const token = value.trim();
  if (token.length === 0 || token.length > 4096) {
    throw new AppError(422, "invalid_payment_token", "payment_token length must be between 1 and 4096 characters.");
  }
  return token;
}

export function dataBagOf(value: unknown): RequestDataBag {
  return isObject(value) ? { ...value } : {};
}
