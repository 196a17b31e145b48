import { describe, expect, it } from "vitest";
import { InMemoryOrderTransactionRepository } from "../src/adapters/inmemory/order-transaction-repository.js";
import { InMemoryPaymentTokenStore } from "../src/adapters/inmemory/payment-token-store.js";
import { nowUnixSeconds } from "../src/infra/clock.js";
import { FixedClock, transactionRecord } from "./helpers.js";

describe("InMemoryPaymentTokenStore", () => {
  it("keeps expired tokens within the retention window", async () => {
    const clock = new FixedClock();
    const store = new InMemoryPaymentTokenStore({ retentionSeconds: 60, clock });
    const now = nowUnixSeconds(clock);

    await store.save("tok_boundary", now - 60);
    await store.save("tok_stale", now - 61);
    await store.save("tok_fresh", now + 1800);

    expect(await store.has("tok_boundary")).toBe(true);
    expect(await store.has("tok_stale")).toBe(false);
    expect(await store.has("tok_fresh")).toBe(true);
  });

  it("purges tokens once the clock moves past their retention", async () => {
    const clock = new FixedClock();
    const store = new InMemoryPaymentTokenStore({ retentionSeconds: 60, clock });
    await store.save("tok_1", nowUnixSeconds(clock) + 10);

    clock.advanceSeconds(71);
    await store.save("tok_2", nowUnixSeconds(clock) + 10);

    expect(await store.has("tok_1")).toBe(false);
    expect(await store.has("tok_2")).toBe(true);
  });

  it("reports whether a delete removed anything", async () => {
    const store = new InMemoryPaymentTokenStore({ clock: new FixedClock() });
    await store.save("tok_1", 1);

    expect(await store.delete("tok_1")).toBe(true);
    expect(await store.delete("tok_1")).toBe(false);
  });

  it("serializes concurrent operations for the same token", async () => {
    const store = new InMemoryPaymentTokenStore();
    const timeline: string[] = [];

    const first = store.withTokenLock("tok-lock", async () => {
      timeline.push("first:start");
      await new Promise<void>((resolve) => setTimeout(resolve, 25));
      timeline.push("first:end");
      return "first";
    });

    const second = store.withTokenLock("tok-lock", async () => {
      timeline.push("second:start");
      timeline.push("second:end");
      return "second";
    });

    const [firstResult, secondResult] = await Promise.all([first, second]);

    expect(firstResult).toBe("first");
    expect(secondResult).toBe("second");
    expect(timeline).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("does not serialize different tokens", async () => {
    const store = new InMemoryPaymentTokenStore();
    const timeline: string[] = [];

    const slow = store.withTokenLock("tok-a", async () => {
      timeline.push("a:start");
      await new Promise<void>((resolve) => setTimeout(resolve, 25));
      timeline.push("a:end");
    });
    const fast = store.withTokenLock("tok-b", async () => {
      timeline.push("b:run");
    });

    await Promise.all([slow, fast]);
    expect(timeline).toEqual(["a:start", "b:run", "a:end"]);
  });
});

describe("InMemoryOrderTransactionRepository", () => {
  it("returns the most recent transaction of an order in the given state", async () => {
    const repository = new InMemoryOrderTransactionRepository();
    await repository.saveTransaction(transactionRecord({ id: "T1", created_at: "2026-03-01T09:00:00.000Z" }));
    await repository.saveTransaction(transactionRecord({ id: "T2", created_at: "2026-03-01T09:30:00.000Z" }));
    await repository.saveTransaction(
      transactionRecord({ id: "T3", state: "failed", created_at: "2026-03-01T09:45:00.000Z" }),
    );
    await repository.saveTransaction(
      transactionRecord({ id: "T4", order_id: "O2", created_at: "2026-03-01T09:50:00.000Z" }),
    );

    expect((await repository.findLatestByOrder("O1", "open"))?.id).toBe("T2");
    expect((await repository.findLatestByOrder("O1", "failed"))?.id).toBe("T3");
    expect(await repository.findLatestByOrder("O1", "paid")).toBeNull();
    expect(await repository.findLatestByOrder("O_missing", "open")).toBeNull();
  });

  it("breaks creation time ties by id", async () => {
    const repository = new InMemoryOrderTransactionRepository();
    await repository.saveTransaction(transactionRecord({ id: "T_a" }));
    await repository.saveTransaction(transactionRecord({ id: "T_b" }));

    expect((await repository.findLatestByOrder("O1", "open"))?.id).toBe("T_b");
  });

  it("hands out copies of stored transactions", async () => {
    const repository = new InMemoryOrderTransactionRepository();
    await repository.saveTransaction(transactionRecord());

    const loaded = await repository.getTransactionById("T1");
    if (!loaded) {
      throw new Error("Expected T1 to be stored.");
    }
    loaded.state = "paid";

    expect((await repository.getTransactionById("T1"))?.state).toBe("open");
    expect(await repository.getTransactionById("T_missing")).toBeNull();
  });
});
