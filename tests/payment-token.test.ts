import { describe, expect, it } from "vitest";
import { InMemoryPaymentTokenStore } from "../src/adapters/inmemory/payment-token-store.js";
import { PAYMENT_INVALID_TOKEN } from "../src/domain/payment-errors.js";
import type { PaymentTokenPayload } from "../src/domain/types.js";
import { AppError } from "../src/infra/app-error.js";
import { PaymentTokenFactory } from "../src/infra/payment-token.js";
import { FixedClock, TEST_TOKEN_SECRET } from "./helpers.js";

const ISSUED_AT = Date.parse("2026-03-01T10:00:00.000Z") / 1000;

function createFactory(secret = TEST_TOKEN_SECRET, verificationSecrets: string[] = []) {
  const clock = new FixedClock();
  const store = new InMemoryPaymentTokenStore({ clock });
  const factory = new PaymentTokenFactory(store, clock, { signingSecret: secret, verificationSecrets });
  return { clock, store, factory };
}

function payload(overrides: Partial<PaymentTokenPayload> = {}): PaymentTokenPayload {
  return {
    paymentMethodId: "M1",
    transactionId: "T1",
    finishUrl: "https://x/ok",
    errorUrl: "https://x/err",
    expiresInSeconds: null,
    ...overrides,
  };
}

async function expectInvalidToken(promise: Promise<unknown>): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(AppError);
  await expect(promise).rejects.toMatchObject({ statusCode: 400, code: PAYMENT_INVALID_TOKEN });
}

describe("PaymentTokenFactory", () => {
  it("round-trips the payload fields through generate and parse", async () => {
    const { factory } = createFactory();
    const token = await factory.generateToken(payload());

    const parsed = await factory.parseToken(token);
    expect(parsed.token).toBe(token);
    expect(parsed.paymentMethodId).toBe("M1");
    expect(parsed.transactionId).toBe("T1");
    expect(parsed.finishUrl).toBe("https://x/ok");
    expect(parsed.errorUrl).toBe("https://x/err");
    expect(parsed.issuedAt).toBe(ISSUED_AT);
    expect(parsed.expiresAt).toBe(ISSUED_AT + 1800);
    expect(parsed.expired).toBe(false);
    expect(parsed.id.length).toBeGreaterThan(0);
  });

  it("keeps null identities and honours an explicit lifetime", async () => {
    const { factory } = createFactory();
    const token = await factory.generateToken(
      payload({ paymentMethodId: null, transactionId: null, finishUrl: null, errorUrl: null, expiresInSeconds: 120 }),
    );

    const parsed = await factory.parseToken(token);
    expect(parsed.paymentMethodId).toBeNull();
    expect(parsed.transactionId).toBeNull();
    expect(parsed.finishUrl).toBeNull();
    expect(parsed.errorUrl).toBeNull();
    expect(parsed.expiresAt).toBe(ISSUED_AT + 120);
  });

  it("reports expiry as data instead of rejecting", async () => {
    const { clock, factory } = createFactory();
    const token = await factory.generateToken(payload({ expiresInSeconds: 60 }));

    clock.advanceSeconds(60);
    expect((await factory.parseToken(token)).expired).toBe(false);

    clock.advanceSeconds(1);
    expect((await factory.parseToken(token)).expired).toBe(true);
  });

  it("rejects a token once it has been invalidated", async () => {
    const { factory } = createFactory();
    const token = await factory.generateToken(payload());

    expect(await factory.invalidateToken(token)).toBe(true);
    expect(await factory.invalidateToken(token)).toBe(false);
    await expectInvalidToken(factory.parseToken(token));
  });

  it("rejects a token that was never issued by the store", async () => {
    const issuer = createFactory();
    const other = createFactory();
    const token = await issuer.factory.generateToken(payload());

    await expectInvalidToken(other.factory.parseToken(token));
  });

  it("rejects a tampered signature", async () => {
    const { factory } = createFactory();
    const token = await factory.generateToken(payload());
    const [body, signature] = token.split(".");
    if (!body || !signature) {
      throw new Error("Encoded token must contain payload and signature.");
    }
    const lastCharacter = signature.endsWith("A") ? "B" : "A";

    await expectInvalidToken(factory.parseToken(`${body}.${signature.slice(0, -1)}${lastCharacter}`));
  });

  it("rejects a tampered payload", async () => {
    const { factory } = createFactory();
    const token = await factory.generateToken(payload());
    const [, signature] = token.split(".");
    const forged = Buffer.from(JSON.stringify({ v: 1, jti: "x", pmi: "M2" }), "utf8").toString("base64url");

    await expectInvalidToken(factory.parseToken(`${forged}.${signature ?? ""}`));
  });

  it("rejects malformed tokens", async () => {
    const { factory } = createFactory();
    await expectInvalidToken(factory.parseToken("not-a-token"));
    await expectInvalidToken(factory.parseToken("a.b.c"));
    await expectInvalidToken(factory.parseToken("abc.d*f"));
  });

  it("accepts tokens signed with a rotated-out secret", async () => {
    const clock = new FixedClock();
    const store = new InMemoryPaymentTokenStore({ clock });
    const previous = new PaymentTokenFactory(store, clock, { signingSecret: "test-secret-previous" });
    const current = new PaymentTokenFactory(store, clock, {
      signingSecret: TEST_TOKEN_SECRET,
      verificationSecrets: ["test-secret-previous"],
    });

    const token = await previous.generateToken(payload());
    expect((await current.parseToken(token)).transactionId).toBe("T1");
  });

  it("serializes work on the same token", async () => {
    const { factory } = createFactory();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = factory.withTokenLock("tok", async () => {
      order.push("first:start");
      await firstGate;
      order.push("first:end");
    });
    const second = factory.withTokenLock("tok", async () => {
      order.push("second");
    });

    await Promise.resolve();
    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });
});
