import { AppError } from "./app-error.js";

const DEFAULT_API_KEY = "dev_checkout_key";
const DEFAULT_TOKEN_SECRET = "dev_payment_token_secret_change_me";
const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  tokenSecret: string;
  tokenVerificationSecrets: string[];
  tokenTtlSeconds: number;
  tokenRetentionSeconds: number;
  publicBaseUrl: string;
  externalPaymentUrl: string;
  /**
   * Global lifetime of finalize tokens in minutes; the system config store may override it
   * per sales channel.
   */
  finalizeTransactionTimeMinutes?: number;
  defaultSalesChannelId: string;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  transactionBackend?: "memory" | "postgres";
  tokenBackend?: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  redisTokenPrefix?: string;
}

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(500, "invalid_runtime_config", `Environment variable '${name}' ${expectation}.`);
}

/**
 * Typed accessors over an environment map. Every accessor throws `invalid_runtime_config`
 * naming the offending variable.
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  isSet(name: string): boolean {
    return this.env[name] !== undefined;
  }

  text(name: string, fallback: string, minLength: number): string {
    const value = (this.env[name] ?? fallback).trim();
    if (value.length < minLength) {
      throw invalidConfig(name, `must contain at least ${minLength} characters`);
    }
    return value;
  }

  optionalText(name: string, minLength: number): string | undefined {
    return this.isSet(name) ? this.text(name, "", minLength) : undefined;
  }

  integer(name: string, fallback: number, range: { min: number; max: number }): number {
    const raw = this.env[name];
    if (raw === undefined) {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw invalidConfig(name, "must be an integer");
    }
    if (value < range.min || value > range.max) {
      throw invalidConfig(name, `must be between ${range.min} and ${range.max}`);
    }
    return value;
  }

  optionalInteger(name: string, range: { min: number; max: number }): number | undefined {
    return this.isSet(name) ? this.integer(name, range.min, range) : undefined;
  }

  flag(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    switch (raw) {
      case undefined:
        return fallback;
      case "true":
      case "1":
        return true;
      case "false":
      case "0":
        return false;
      default:
        throw invalidConfig(name, "must be a boolean (true/false/1/0)");
    }
  }

  oneOf<TValue extends string>(name: string, allowed: readonly TValue[], fallback: TValue): TValue {
    const raw = this.env[name];
    if (raw === undefined) {
      return fallback;
    }
    const matched = allowed.find((value) => value === raw.trim());
    if (matched === undefined) {
      throw invalidConfig(name, `must be one of: ${allowed.join(", ")}`);
    }
    return matched;
  }

  /**
   * Comma separated values, deduplicated in order. Unset yields undefined so callers can
   * fall back to the single-value variable.
   */
  list(name: string, limits: { minItemLength: number; maxItems: number }): string[] | undefined {
    const raw = this.env[name];
    if (raw === undefined) {
      return undefined;
    }
    const items = raw
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    if (items.length === 0) {
      throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
    }
    if (items.length > limits.maxItems) {
      throw invalidConfig(name, `must contain at most ${limits.maxItems} values`);
    }
    if (items.some((item) => item.length < limits.minItemLength)) {
      throw invalidConfig(name, `items must contain at least ${limits.minItemLength} characters`);
    }
    return [...new Set(items)];
  }

  httpUrl(name: string, fallback: string): string {
    const value = this.text(name, fallback, 8);
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      throw invalidConfig(name, "must be an absolute URL");
    }
    if (protocol !== "http:" && protocol !== "https:") {
      throw invalidConfig(name, "must use http or https");
    }
    return value;
  }
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const reader = new EnvReader(env);
  const isProduction = env.NODE_ENV === "production";

  const rotatedApiKeys = reader.list("CHECKOUT_API_KEYS", { minItemLength: 8, maxItems: 100 });
  const singleApiKey = reader.text("CHECKOUT_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = rotatedApiKeys ?? [singleApiKey];
  if (isProduction && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      rotatedApiKeys ? "CHECKOUT_API_KEYS" : "CHECKOUT_API_KEY",
      "must not include default key value in production",
    );
  }

  // the first secret signs, all of them verify
  const rotatedSecrets = reader.list("CHECKOUT_TOKEN_SECRETS", { minItemLength: 16, maxItems: 10 });
  const singleSecret = reader.text("CHECKOUT_TOKEN_SECRET", DEFAULT_TOKEN_SECRET, 16);
  const tokenVerificationSecrets = rotatedSecrets ?? [singleSecret];
  const tokenSecret = tokenVerificationSecrets[0] ?? singleSecret;
  if (isProduction && tokenSecret === DEFAULT_TOKEN_SECRET) {
    throw invalidConfig("CHECKOUT_TOKEN_SECRET", "must not use default value in production");
  }

  const transactionBackend = reader.oneOf("CHECKOUT_TRANSACTION_BACKEND", ["memory", "postgres"] as const, "memory");
  const tokenBackend = reader.oneOf("CHECKOUT_TOKEN_BACKEND", ["memory", "redis"] as const, "memory");
  const postgresUrl = reader.optionalText("CHECKOUT_POSTGRES_URL", 12);
  const redisUrl = reader.optionalText("CHECKOUT_REDIS_URL", 8);
  if (transactionBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("CHECKOUT_POSTGRES_URL", "is required when the postgres transaction backend is enabled");
  }
  if (tokenBackend === "redis" && !redisUrl) {
    throw invalidConfig("CHECKOUT_REDIS_URL", "is required when the redis token backend is enabled");
  }

  const finalizeTransactionTimeMinutes = reader.optionalInteger("CHECKOUT_FINALIZE_TRANSACTION_TIME_MINUTES", {
    min: 1,
    max: 10_080,
  });

  return {
    host: reader.text("HOST", "0.0.0.0", 1),
    port: reader.integer("PORT", 8080, { min: 1, max: 65535 }),
    apiKey: apiKeys[0] ?? singleApiKey,
    apiKeys,
    tokenSecret,
    tokenVerificationSecrets,
    tokenTtlSeconds: reader.integer("CHECKOUT_TOKEN_TTL_SECONDS", 1800, { min: 60, max: 604_800 }),
    tokenRetentionSeconds: reader.integer("CHECKOUT_TOKEN_RETENTION_SECONDS", 86400, { min: 60, max: 2_592_000 }),
    publicBaseUrl: reader.httpUrl("CHECKOUT_PUBLIC_BASE_URL", "http://localhost:8080"),
    externalPaymentUrl: reader.httpUrl("CHECKOUT_EXTERNAL_PAYMENT_URL", "http://localhost:8081/checkout"),
    defaultSalesChannelId: reader.text("CHECKOUT_DEFAULT_SALES_CHANNEL_ID", "default", 1),
    logLevel: reader.oneOf("CHECKOUT_LOG_LEVEL", LOG_LEVELS, "info"),
    metricsEnabled: reader.flag("CHECKOUT_METRICS_ENABLED", true),
    transactionBackend,
    tokenBackend,
    redisTokenPrefix: reader.text("CHECKOUT_REDIS_TOKEN_PREFIX", "checkout:payment-token", 3),
    ...(finalizeTransactionTimeMinutes !== undefined ? { finalizeTransactionTimeMinutes } : {}),
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
