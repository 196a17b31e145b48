import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";
import type { PaymentToken, PaymentTokenPayload } from "../domain/types.js";
import { invalidToken } from "../domain/payment-errors.js";
import type { PaymentTokenStorePort } from "../ports/payment-token-store.js";
import { AppError } from "./app-error.js";
import { nowUnixSeconds, type ClockPort } from "./clock.js";

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;
const DEFAULT_TTL_SECONDS = 1800;

interface PaymentTokenClaimsV1 {
  v: 1;
  jti: string;
  pmi: string | null;
  tid: string | null;
  fur: string | null;
  eur: string | null;
  iat: number;
  exp: number;
}

interface PaymentTokenFactoryOptions {
  signingSecret: string;
  verificationSecrets?: string[];
  defaultTtlSeconds?: number;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isClaims(claims: unknown): claims is PaymentTokenClaimsV1 {
  return (
    isRecord(claims)
    && claims.v === 1
    && typeof claims.jti === "string"
    && claims.jti.length > 0
    && isNullableString(claims.pmi)
    && isNullableString(claims.tid)
    && isNullableString(claims.fur)
    && isNullableString(claims.eur)
    && Number.isInteger(claims.iat)
    && Number.isInteger(claims.exp)
  );
}

/**
 * Issues, verifies and invalidates the signed single-use token that links a payment
 * started in `pay` to its later confirmation callback.
 */
export class PaymentTokenFactory {
  private readonly signingSecret: string;
  private readonly verificationSecrets: string[];
  private readonly defaultTtlSeconds: number;

  constructor(
    private readonly store: PaymentTokenStorePort,
    private readonly clock: ClockPort,
    options: PaymentTokenFactoryOptions,
  ) {
    this.signingSecret = options.signingSecret;
    this.verificationSecrets = [
      ...new Set([options.signingSecret, ...(options.verificationSecrets ?? [])]),
    ];
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;
  }

  async generateToken(payload: PaymentTokenPayload): Promise<string> {
    const issuedAt = nowUnixSeconds(this.clock);
    const claims: PaymentTokenClaimsV1 = {
      v: 1,
      jti: randomUUID(),
      pmi: payload.paymentMethodId,
      tid: payload.transactionId,
      fur: payload.finishUrl,
      eur: payload.errorUrl,
      iat: issuedAt,
      exp: issuedAt + (payload.expiresInSeconds ?? this.defaultTtlSeconds),
    };
    const payloadBase64Url = Buffer.from(JSON.stringify(claims), "utf8").toString("base64url");
    const signatureBase64Url = this.sign(payloadBase64Url, this.signingSecret);
    await this.store.save(claims.jti, claims.exp);
    return `${payloadBase64Url}.${signatureBase64Url}`;
  }

  /**
   * Expired tokens are returned with `expired: true` rather than rejected; tokens that
   * were tampered with, never issued or already invalidated throw.
   */
  async parseToken(token: string): Promise<PaymentToken> {
    const claims = this.verify(token);
    if (!(await this.store.has(claims.jti))) {
      throw invalidToken("token was already used or never issued.");
    }

    return {
      id: claims.jti,
      token,
      paymentMethodId: claims.pmi,
      transactionId: claims.tid,
      finishUrl: claims.fur,
      errorUrl: claims.eur,
      issuedAt: claims.iat,
      expiresAt: claims.exp,
      expired: claims.exp < nowUnixSeconds(this.clock),
    };
  }

  async invalidateToken(token: string): Promise<boolean> {
    const claims = this.verify(token);
    return this.store.delete(claims.jti);
  }

  withTokenLock<TOutput>(token: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    return this.store.withTokenLock(token, operation);
  }

  private verify(token: string): PaymentTokenClaimsV1 {
    const parts = token.split(".");
    if (parts.length !== 2) {
      throw invalidToken("token format is invalid.");
    }
    const [payloadBase64Url, signatureBase64Url] = parts;
    if (!payloadBase64Url || !signatureBase64Url) {
      throw invalidToken("token format is invalid.");
    }
    if (!BASE64URL_PATTERN.test(payloadBase64Url) || !BASE64URL_PATTERN.test(signatureBase64Url)) {
      throw invalidToken("token contains invalid characters.");
    }

    const providedSignatureBuffer = Buffer.from(signatureBase64Url, "utf8");
    let isValidSignature = false;
    for (const secret of this.verificationSecrets) {
      const expectedSignatureBuffer = Buffer.from(this.sign(payloadBase64Url, secret), "utf8");
      if (
        providedSignatureBuffer.length === expectedSignatureBuffer.length
        && timingSafeEqual(providedSignatureBuffer, expectedSignatureBuffer)
      ) {
        isValidSignature = true;
        break;
      }
    }
    if (!isValidSignature) {
      throw invalidToken("token signature is invalid.");
    }

    try {
      const raw = Buffer.from(payloadBase64Url, "base64url").toString("utf8");
      const claims: unknown = JSON.parse(raw);
      if (!isClaims(claims)) {
        throw invalidToken("token payload is invalid.");
      }
      return claims;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw invalidToken("token payload is invalid.");
    }
  }

  private sign(payloadBase64Url: string, secret: string): string {
    return createHmac("sha256", secret).update(payloadBase64Url).digest("base64url");
  }
}
