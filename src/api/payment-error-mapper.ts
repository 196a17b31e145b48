import { appendErrorCode, finalizeRedirectErrorCode } from "../domain/payment-errors.js";
import type { PaymentTokenResult } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

export interface ErrorResponse {
  statusCode: number;
  body: {
    error: {
      code: string;
      message: string;
      request_id: string;
    };
  };
}

export type FinalizeResponse =
  | { kind: "redirect"; location: string }
  | { kind: "error"; error: Error }
  | { kind: "no_content" };

export function toErrorResponse(error: unknown, requestId: string): ErrorResponse {
  if (error instanceof AppError) {
    return {
      statusCode: error.statusCode,
      body: { error: { code: error.code, message: error.message, request_id: requestId } },
    };
  }
  return {
    statusCode: 500,
    body: { error: { code: "internal_server_error", message: "Unexpected error.", request_id: requestId } },
  };
}

/**
 * Decides how the confirmation callback answers the returning customer.
 */
export function toFinalizeResponse(result: PaymentTokenResult): FinalizeResponse {
  if (result.exception) {
    if (result.errorUrl) {
      return {
        kind: "redirect",
        location: appendErrorCode(result.errorUrl, finalizeRedirectErrorCode(result.exception)),
      };
    }
    return { kind: "error", error: result.exception };
  }
  if (result.finishUrl) {
    return { kind: "redirect", location: result.finishUrl };
  }
  return { kind: "no_content" };
}
