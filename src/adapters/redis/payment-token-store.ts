import { randomUUID } from "node:crypto";
import type { Redis } from "ioredis";
import { AppError } from "../../infra/app-error.js";
import type { PaymentTokenStorePort } from "../../ports/payment-token-store.js";

interface RedisPaymentTokenStoreOptions {
  keyPrefix: string;
  retentionSeconds: number;
  lockTtlMs?: number;
  lockWaitMs?: number;
  lockRetryDelayMs?: number;
  nowMs?: () => number;
}

const RELEASE_LOCK_LUA = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

export class RedisPaymentTokenStore implements PaymentTokenStorePort {
  private readonly lockTtlMs: number;
  private readonly lockWaitMs: number;
  private readonly lockRetryDelayMs: number;
  private readonly nowMs: () => number;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisPaymentTokenStoreOptions,
  ) {
    this.lockTtlMs = options.lockTtlMs ?? 30_000;
    this.lockWaitMs = options.lockWaitMs ?? 10_000;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 50;
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async save(tokenId: string, expiresAt: number): Promise<void> {
    const ttlSeconds = Math.max(1, expiresAt - Math.floor(this.nowMs() / 1000) + this.options.retentionSeconds);
    await this.redis.set(this.tokenKey(tokenId), String(expiresAt), "EX", ttlSeconds);
  }

  async has(tokenId: string): Promise<boolean> {
    return (await this.redis.exists(this.tokenKey(tokenId))) === 1;
  }

  async delete(tokenId: string): Promise<boolean> {
    return (await this.redis.del(this.tokenKey(tokenId))) === 1;
  }

  async withTokenLock<TOutput>(key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const lockKey = `${this.options.keyPrefix}:lock:${key}`;
    const owner = randomUUID();
    const deadline = this.nowMs() + this.lockWaitMs;

    while ((await this.redis.set(lockKey, owner, "PX", this.lockTtlMs, "NX")) !== "OK") {
      if (this.nowMs() >= deadline) {
        throw new AppError(503, "payment_token_locked", "Payment token is being processed by another request.");
      }
      await delay(this.lockRetryDelayMs);
    }

    try {
      return await operation();
    } finally {
      await this.redis.eval(RELEASE_LOCK_LUA, 1, lockKey, owner);
    }
  }

  private tokenKey(tokenId: string): string {
    return `${this.options.keyPrefix}:${tokenId}`;
  }
}
