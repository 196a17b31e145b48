import { Writable } from "node:stream";
import { InMemoryEventBus } from "../src/adapters/inmemory/event-bus.js";
import { InMemoryOrderTransactionRepository } from "../src/adapters/inmemory/order-transaction-repository.js";
import { InMemoryPaymentMethodRepository } from "../src/adapters/inmemory/payment-method-repository.js";
import { InMemoryPaymentTokenStore } from "../src/adapters/inmemory/payment-token-store.js";
import { InMemorySystemConfig } from "../src/adapters/inmemory/system-config.js";
import { LegacyPaymentFlow } from "../src/application/legacy-payment-flow.js";
import { PaymentHandlerRegistry } from "../src/application/payment-handler-registry.js";
import { PaymentProcessor } from "../src/application/payment-processor.js";
import { PaymentReturnUrlBuilder } from "../src/application/return-url-builder.js";
import { TransactionStateGateway } from "../src/application/transaction-state-gateway.js";
import type {
  OrderTransactionRecord,
  PaymentMethodRecord,
  SalesChannelContext,
} from "../src/domain/types.js";
import type { ClockPort } from "../src/infra/clock.js";
import { makeLogger, type Logger } from "../src/infra/logger.js";
import { PaymentTokenFactory } from "../src/infra/payment-token.js";
import { RouteUrlGenerator } from "../src/infra/url-generator.js";

export const TEST_TOKEN_SECRET = "test-secret-0123456789";
export const TEST_BASE_URL = "https://shop.example.test";

export class FixedClock implements ClockPort {
  constructor(private current: string = "2026-03-01T10:00:00.000Z") {}

  nowIso(): string {
    return this.current;
  }

  advanceSeconds(seconds: number): void {
    this.current = new Date(Date.parse(this.current) + seconds * 1000).toISOString();
  }
}

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * A pino logger whose JSON lines are collected in memory.
 */
export function makeCapturingLogger(): { logger: Logger; entries: CapturedLog[] } {
  const entries: CapturedLog[] = [];
  const destination = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      for (const line of chunk.toString().split("\n")) {
        if (line.trim().length === 0) {
          continue;
        }
        const parsed: unknown = JSON.parse(line);
        if (parsed && typeof parsed === "object" && "msg" in parsed && "level" in parsed) {
          const { msg, level } = parsed;
          if (typeof msg === "string" && typeof level === "number") {
            entries.push({ ...parsed, msg, level });
          }
        }
      }
      callback();
    },
  });
  return { logger: makeLogger({ level: "debug", destination }), entries };
}

export function transactionRecord(overrides: Partial<OrderTransactionRecord> = {}): OrderTransactionRecord {
  return {
    id: "T1",
    order_id: "O1",
    payment_method_id: "M1",
    state: "open",
    amount: 4990,
    currency: "EUR",
    custom_fields: null,
    created_at: "2026-03-01T09:00:00.000Z",
    updated_at: "2026-03-01T09:00:00.000Z",
    ...overrides,
  };
}

export function paymentMethodRecord(
  id: string,
  handlerIdentifier: string,
  overrides: Partial<PaymentMethodRecord> = {},
): PaymentMethodRecord {
  return {
    id,
    handler_identifier: handlerIdentifier,
    active: true,
    app_payment_method: null,
    created_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function storefrontContext(overrides: Partial<SalesChannelContext> = {}): SalesChannelContext {
  return {
    salesChannelId: "sc_main",
    paymentMethodId: "M1",
    customer: { id: "cust_1" },
    context: { source: "storefront", salesChannelId: "sc_main" },
    ...overrides,
  };
}

/**
 * Wires the processor the way the server does, on in-memory adapters.
 */
export function createProcessorHarness(options: { logger?: Logger } = {}) {
  const clock = new FixedClock();
  const logger = options.logger ?? makeLogger();
  const transactionRepository = new InMemoryOrderTransactionRepository();
  const paymentMethods = new InMemoryPaymentMethodRepository();
  const tokenStore = new InMemoryPaymentTokenStore({ clock });
  const systemConfig = new InMemorySystemConfig();
  const eventBus = new InMemoryEventBus();
  const transactions = new TransactionStateGateway(transactionRepository, eventBus, clock, "test-suite");
  const tokenFactory = new PaymentTokenFactory(tokenStore, clock, { signingSecret: TEST_TOKEN_SECRET });
  const returnUrlBuilder = new PaymentReturnUrlBuilder(
    tokenFactory,
    systemConfig,
    new RouteUrlGenerator(TEST_BASE_URL),
  );
  const registry = new PaymentHandlerRegistry(paymentMethods);
  const legacyFlow = new LegacyPaymentFlow(registry, transactions, returnUrlBuilder, logger);
  const processor = new PaymentProcessor({
    handlers: registry,
    transactions,
    tokenFactory,
    returnUrlBuilder,
    legacyFlow,
    logger,
  });

  return {
    clock,
    transactionRepository,
    paymentMethods,
    tokenStore,
    systemConfig,
    eventBus,
    transactions,
    tokenFactory,
    returnUrlBuilder,
    registry,
    legacyFlow,
    processor,
  };
}
