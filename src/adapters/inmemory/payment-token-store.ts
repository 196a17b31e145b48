import { nowUnixSeconds, type ClockPort } from "../../infra/clock.js";
import { KeyedLock } from "../../infra/keyed-lock.js";
import type { PaymentTokenStorePort } from "../../ports/payment-token-store.js";

interface InMemoryPaymentTokenStoreOptions {
  retentionSeconds?: number;
  clock?: ClockPort;
}

const defaultClock: ClockPort = {
  nowIso() {
    return new Date().toISOString();
  },
};

export class InMemoryPaymentTokenStore implements PaymentTokenStorePort {
  private readonly tokens = new Map<string, number>();
  private readonly lock = new KeyedLock();
  private readonly retentionSeconds: number;
  private readonly clock: ClockPort;

  constructor(options: InMemoryPaymentTokenStoreOptions = {}) {
    this.retentionSeconds = options.retentionSeconds ?? 86400;
    this.clock = options.clock ?? defaultClock;
  }

  async save(tokenId: string, expiresAt: number): Promise<void> {
    this.purgeStale();
    this.tokens.set(tokenId, expiresAt);
  }

  async has(tokenId: string): Promise<boolean> {
    return this.tokens.has(tokenId);
  }

  async delete(tokenId: string): Promise<boolean> {
    return this.tokens.delete(tokenId);
  }

  withTokenLock<TOutput>(key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    return this.lock.run(key, operation);
  }

  // expired tokens stay known for the retention window so they report as expired, not invalid
  private purgeStale(): void {
    const threshold = nowUnixSeconds(this.clock) - this.retentionSeconds;
    for (const [tokenId, expiresAt] of this.tokens) {
      if (expiresAt < threshold) {
        this.tokens.delete(tokenId);
      }
    }
  }
}
