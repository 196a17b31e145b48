import { describe, expect, it } from "vitest";
import {
  FINALIZE_TRANSACTION_TIME_KEY,
  PAYMENT_TOKEN_PARAMETER,
  finalizeWindowSeconds,
} from "../src/application/return-url-builder.js";
import { RouteUrlGenerator } from "../src/infra/url-generator.js";
import { AppError } from "../src/infra/app-error.js";
import { createProcessorHarness, storefrontContext, transactionRecord } from "./helpers.js";

const ISSUED_AT = Date.parse("2026-03-01T10:00:00.000Z") / 1000;

function tokenOf(returnUrl: string): string {
  const token = new URL(returnUrl).searchParams.get(PAYMENT_TOKEN_PARAMETER);
  if (!token) {
    throw new Error("Return URL must carry a payment token.");
  }
  return token;
}

describe("finalizeWindowSeconds", () => {
  it("converts numeric minutes to seconds", () => {
    expect(finalizeWindowSeconds(30)).toBe(1800);
    expect(finalizeWindowSeconds("15")).toBe(900);
    expect(finalizeWindowSeconds(1.9)).toBe(60);
  });

  it("treats anything non-numeric as unset", () => {
    expect(finalizeWindowSeconds(undefined)).toBeNull();
    expect(finalizeWindowSeconds(null)).toBeNull();
    expect(finalizeWindowSeconds("")).toBeNull();
    expect(finalizeWindowSeconds("soon")).toBeNull();
    expect(finalizeWindowSeconds(Number.NaN)).toBeNull();
    expect(finalizeWindowSeconds({ minutes: 5 })).toBeNull();
  });
});

describe("PaymentReturnUrlBuilder", () => {
  it("points at the finalize route with a token for the transaction", async () => {
    const harness = createProcessorHarness();
    const returnUrl = await harness.returnUrlBuilder.build(
      transactionRecord(),
      "https://x/ok",
      "https://x/err",
      storefrontContext(),
    );

    const url = new URL(returnUrl);
    expect(`${url.origin}${url.pathname}`).toBe("https://shop.example.test/payment/finalize-transaction");

    const token = await harness.tokenFactory.parseToken(tokenOf(returnUrl));
    expect(token.paymentMethodId).toBe("M1");
    expect(token.transactionId).toBe("T1");
    expect(token.finishUrl).toBe("https://x/ok");
    expect(token.errorUrl).toBe("https://x/err");
    expect(token.expiresAt).toBe(ISSUED_AT + 1800);
  });

  it("uses the channel finalize window before the global one", async () => {
    const harness = createProcessorHarness();
    harness.systemConfig.set(FINALIZE_TRANSACTION_TIME_KEY, 5);
    harness.systemConfig.set(FINALIZE_TRANSACTION_TIME_KEY, "10", "sc_main");

    const channelUrl = await harness.returnUrlBuilder.build(transactionRecord(), null, null, storefrontContext());
    expect((await harness.tokenFactory.parseToken(tokenOf(channelUrl))).expiresAt).toBe(ISSUED_AT + 600);

    const otherChannelUrl = await harness.returnUrlBuilder.build(
      transactionRecord(),
      null,
      null,
      storefrontContext({ salesChannelId: "sc_other" }),
    );
    expect((await harness.tokenFactory.parseToken(tokenOf(otherChannelUrl))).expiresAt).toBe(ISSUED_AT + 300);
  });
});

describe("RouteUrlGenerator", () => {
  it("rejects unknown routes", () => {
    const generator = new RouteUrlGenerator("https://shop.example.test");
    expect(() => generator.absolute("unknown.route", {})).toThrowError(AppError);
  });
});
