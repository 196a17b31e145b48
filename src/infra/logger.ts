import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "token",
  "paymentToken",
  "*.token",
  "*.paymentToken",
  "headers.authorization",
  "req.headers.authorization",
];

interface MakeLoggerOptions {
  level?: string;
  serviceName?: string;
  destination?: DestinationStream;
}

/**
 * JSON logger on stdout. Silenced under Vitest unless a destination is passed explicitly.
 */
export function makeLogger(options: MakeLoggerOptions = {}): Logger {
  const isVitest = process.env.VITEST === "true";
  const config = {
    level: options.level ?? "info",
    enabled: !isVitest || options.destination !== undefined,
    base: { service: options.serviceName ?? "checkout-payment-processor" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  if (options.destination) {
    return pino(config, options.destination);
  }
  return pino(config, pino.destination({ dest: 1, sync: process.env.NODE_ENV !== "production" }));
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
