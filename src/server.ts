import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { Pool } from "pg";
import { CashPaymentHandler, CASH_PAYMENT_HANDLER } from "./adapters/handlers/cash-payment-handler.js";
import {
  EXTERNAL_REDIRECT_PAYMENT_HANDLER,
  ExternalRedirectPaymentHandler,
} from "./adapters/handlers/external-redirect-payment-handler.js";
import { INVOICE_PAYMENT_HANDLER, InvoicePaymentHandler } from "./adapters/handlers/invoice-payment-handler.js";
import { InMemoryEventBus } from "./adapters/inmemory/event-bus.js";
import { InMemoryOrderTransactionRepository } from "./adapters/inmemory/order-transaction-repository.js";
import { InMemoryPaymentMethodRepository } from "./adapters/inmemory/payment-method-repository.js";
import { InMemoryPaymentTokenStore } from "./adapters/inmemory/payment-token-store.js";
import { InMemorySystemConfig } from "./adapters/inmemory/system-config.js";
import { PostgresOrderTransactionRepository } from "./adapters/postgres/order-transaction-repository.js";
import { PostgresPaymentMethodRepository } from "./adapters/postgres/payment-method-repository.js";
import { RedisPaymentTokenStore } from "./adapters/redis/payment-token-store.js";
import { LegacyPaymentFlow } from "./application/legacy-payment-flow.js";
import { PaymentHandlerRegistry } from "./application/payment-handler-registry.js";
import { PaymentProcessor } from "./application/payment-processor.js";
import { FINALIZE_TRANSACTION_TIME_KEY, PaymentReturnUrlBuilder } from "./application/return-url-builder.js";
import { TransactionStateGateway } from "./application/transaction-state-gateway.js";
import { toErrorResponse, toFinalizeResponse } from "./api/payment-error-mapper.js";
import {
  assertPayOrderInput,
  assertValidatePaymentInput,
  dataBagOf,
  normalizeResourceId,
  requirePaymentToken,
  requireResourceId,
} from "./api/validators.js";
import type { ContextSource, SalesChannelContext } from "./domain/types.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { makeLogger, type Logger } from "./infra/logger.js";
import { CheckoutMetricsRegistry, type PaymentFlow, type PaymentFlowOutcome } from "./infra/metrics.js";
import { PaymentTokenFactory } from "./infra/payment-token.js";
import { RouteUrlGenerator } from "./infra/url-generator.js";
import type { EventBusPort } from "./ports/event-bus.js";
import type { OrderTransactionRepositoryPort } from "./ports/order-transaction-repository.js";
import type { PaymentHandler } from "./ports/payment-handler.js";
import type { PaymentMethodRepositoryPort } from "./ports/payment-method-repository.js";
import type { PaymentTokenStorePort } from "./ports/payment-token-store.js";
import type { SystemConfigPort } from "./ports/system-config.js";

const EVENT_SOURCE = "checkout-payment-processor";

export interface AppDependencies {
  clock: ClockPort;
  logger: Logger;
  transactionRepository: OrderTransactionRepositoryPort;
  paymentMethodRepository: PaymentMethodRepositoryPort;
  tokenStore: PaymentTokenStorePort;
  systemConfig: SystemConfigPort;
  eventBus: EventBusPort;
  /**
   * Registered next to the built-in handlers; an identifier already taken replaces it.
   */
  handlers: Record<string, PaymentHandler>;
}

type HeaderBag = FastifyRequest["headers"];

function requireBearerApiKey(headers: HeaderBag, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function salesChannelContextOf(
  headers: HeaderBag,
  source: ContextSource,
  options: { salesChannelId?: string; requirePaymentMethod?: boolean } = {},
): SalesChannelContext {
  const salesChannelId =
    options.salesChannelId ?? requireResourceId(headers["x-sales-channel-id"], "sales_channel_id");
  const paymentMethodId = options.requirePaymentMethod
    ? requireResourceId(headers["x-payment-method-id"], "payment_method_id")
    : normalizeResourceId(headers["x-payment-method-id"], "payment_method_id") ?? "";
  const customerId = normalizeResourceId(headers["x-customer-id"], "customer_id");

  return {
    salesChannelId,
    paymentMethodId,
    customer: customerId ? { id: customerId } : null,
    context: { source, salesChannelId },
  };
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  dependencies: Partial<AppDependencies> = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const metrics = new CheckoutMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const closeActions: Array<() => Promise<void>> = [];
  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  const clock = dependencies.clock ?? new SystemClock();
  const logger = dependencies.logger ?? makeLogger({ level: config.logLevel });

  const postgresPool =
    config.postgresUrl && config.transactionBackend === "postgres" && !dependencies.transactionRepository
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const redisClient =
    config.redisUrl && config.tokenBackend === "redis" && !dependencies.tokenStore
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  let transactionRepository: OrderTransactionRepositoryPort;
  let paymentMethodRepository: PaymentMethodRepositoryPort;
  if (config.transactionBackend === "postgres" && !dependencies.transactionRepository) {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres transaction backend requested without PostgreSQL.");
    }
    transactionRepository = new PostgresOrderTransactionRepository(postgresPool);
    paymentMethodRepository =
      dependencies.paymentMethodRepository ?? new PostgresPaymentMethodRepository(postgresPool);
  } else {
    transactionRepository = dependencies.transactionRepository ?? new InMemoryOrderTransactionRepository();
    paymentMethodRepository = dependencies.paymentMethodRepository ?? new InMemoryPaymentMethodRepository();
  }

  let tokenStore: PaymentTokenStorePort;
  if (dependencies.tokenStore) {
    tokenStore = dependencies.tokenStore;
  } else if (config.tokenBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis token backend requested without Redis client.");
    }
    tokenStore = new RedisPaymentTokenStore(redisClient, {
      keyPrefix: config.redisTokenPrefix ?? "checkout:payment-token",
      retentionSeconds: config.tokenRetentionSeconds,
    });
  } else {
    tokenStore = new InMemoryPaymentTokenStore({ retentionSeconds: config.tokenRetentionSeconds, clock });
  }

  let systemConfig: SystemConfigPort;
  if (dependencies.systemConfig) {
    systemConfig = dependencies.systemConfig;
  } else {
    const defaults = new InMemorySystemConfig();
    if (config.finalizeTransactionTimeMinutes !== undefined) {
      defaults.set(FINALIZE_TRANSACTION_TIME_KEY, config.finalizeTransactionTimeMinutes);
    }
    systemConfig = defaults;
  }

  const eventBus = dependencies.eventBus ?? new InMemoryEventBus();
  const transactions = new TransactionStateGateway(transactionRepository, eventBus, clock, EVENT_SOURCE);
  const tokenFactory = new PaymentTokenFactory(tokenStore, clock, {
    signingSecret: config.tokenSecret,
    verificationSecrets: config.tokenVerificationSecrets,
    defaultTtlSeconds: config.tokenTtlSeconds,
  });
  const returnUrlBuilder = new PaymentReturnUrlBuilder(
    tokenFactory,
    systemConfig,
    new RouteUrlGenerator(config.publicBaseUrl),
  );

  const registry = new PaymentHandlerRegistry(paymentMethodRepository, {
    [CASH_PAYMENT_HANDLER]: new CashPaymentHandler(),
    [EXTERNAL_REDIRECT_PAYMENT_HANDLER]: new ExternalRedirectPaymentHandler(transactions, {
      checkoutUrl: config.externalPaymentUrl,
    }),
    [INVOICE_PAYMENT_HANDLER]: new InvoicePaymentHandler(),
    ...dependencies.handlers,
  });
  const legacyFlow = new LegacyPaymentFlow(registry, transactions, returnUrlBuilder, logger);
  const processor = new PaymentProcessor({
    handlers: registry,
    transactions,
    tokenFactory,
    returnUrlBuilder,
    legacyFlow,
    logger,
  });

  eventBus.subscribe(async (event) => {
    if (config.metricsEnabled) {
      metrics.recordTransactionEvent(event.type);
    }
  });

  async function trackFlow<TResult>(
    flow: PaymentFlow,
    operation: () => Promise<TResult>,
    outcomeOf: (result: TResult) => PaymentFlowOutcome,
  ): Promise<TResult> {
    try {
      const result = await operation();
      metrics.recordPaymentFlowOutcome(flow, outcomeOf(result));
      return result;
    } catch (error) {
      metrics.recordPaymentFlowOutcome(flow, "failed");
      throw error;
    }
  }

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartTimes.set(request, process.hrtime.bigint());
    if (!request.url.startsWith("/v1/")) {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStartTimes.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post<{ Params: { orderId: string }; Querystring: Record<string, string | undefined> }>(
    "/v1/orders/:orderId/payment",
    async (request, reply) => {
      const orderId = requireResourceId(request.params.orderId, "order_id");
      const body: unknown = request.body;
      assertPayOrderInput(body);
      const salesChannelContext = salesChannelContextOf(request.headers, "storefront");

      const redirect = await trackFlow(
        "pay",
        () =>
          processor.pay(
            orderId,
            { query: { ...request.query }, body: dataBagOf(body?.data) },
            salesChannelContext,
            body?.finish_url ?? null,
            body?.error_url ?? null,
          ),
        (result) => (result ? "redirect" : "completed"),
      );
      return reply.status(200).send({ redirect_url: redirect?.url ?? null });
    },
  );

  app.route<{ Querystring: Record<string, string | undefined> }>({
    method: ["GET", "POST"],
    url: "/payment/finalize-transaction",
    handler: async (request, reply) => {
      const paymentToken = requirePaymentToken(request.query.payment_token);
      const salesChannelContext = salesChannelContextOf(request.headers, "storefront", {
        salesChannelId:
          normalizeResourceId(request.headers["x-sales-channel-id"], "sales_channel_id")
          ?? config.defaultSalesChannelId,
      });

      const result = await trackFlow(
        "finalize",
        () =>
          processor.finalize(
            paymentToken,
            { query: { ...request.query }, body: dataBagOf(request.body) },
            salesChannelContext,
          ),
        (tokenResult) => (tokenResult.exception ? "failed" : "completed"),
      );

      const response = toFinalizeResponse(result);
      switch (response.kind) {
        case "redirect":
          return reply.redirect(response.location, 302);
        case "error":
          throw response.error;
        case "no_content":
          return reply.status(204).send();
      }
    },
  });

  app.post("/v1/checkout/payment/validate", async (request, reply) => {
    const body: unknown = request.body;
    assertValidatePaymentInput(body);
    const salesChannelContext = salesChannelContextOf(request.headers, "storefront", {
      requirePaymentMethod: true,
    });

    const validation = await trackFlow(
      "validate",
      () => processor.validate(body.cart, dataBagOf(body.data), salesChannelContext),
      (result) => (result ? "completed" : "skipped"),
    );
    return reply.status(200).send({ validation });
  });

  app.post<{ Params: { orderId: string } }>("/v1/orders/:orderId/recurring-payment", async (request, reply) => {
    const orderId = requireResourceId(request.params.orderId, "order_id");
    const salesChannelId = requireResourceId(request.headers["x-sales-channel-id"], "sales_channel_id");

    await trackFlow(
      "recurring",
      () => processor.recurring(orderId, { source: "system", salesChannelId }),
      () => "completed",
    );
    return reply.status(204).send();
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (!(error instanceof AppError)) {
      logger.error({ err: error, requestId: request.id }, "Unhandled error");
    }
    const response = toErrorResponse(error, request.id);
    return reply.status(response.statusCode).send(response.body);
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
