import type { PaymentMethodRecord } from "../domain/types.js";
import type {
  PaymentHandler,
  PaymentHandlerCapabilities,
  PaymentHandlerResolverPort,
  ResolvedPaymentHandler,
} from "../ports/payment-handler.js";
import type { PaymentMethodRepositoryPort } from "../ports/payment-method-repository.js";

export function appHandlerIdentifier(appName: string, identifier: string): string {
  return `app:${appName}:${identifier}`;
}

export function capabilitiesOf(handler: PaymentHandler): PaymentHandlerCapabilities {
  switch (handler.kind) {
    case "modern":
      return { supportsModern: true, supportsPreparedValidation: false, supportsRecurring: true };
    case "legacy_prepared":
      return {
        supportsModern: false,
        supportsPreparedValidation: true,
        supportsRecurring: handler.captureRecurring !== undefined,
      };
    case "legacy_sync":
    case "legacy_async":
      return {
        supportsModern: false,
        supportsPreparedValidation: false,
        supportsRecurring: handler.captureRecurring !== undefined,
      };
  }
}

/**
 * Maps payment method ids to registered handlers. Lookups never throw for unknown or
 * inactive methods or for unregistered identifiers; they resolve to `null`.
 */
export class PaymentHandlerRegistry implements PaymentHandlerResolverPort {
  private readonly handlers = new Map<string, PaymentHandler>();

  constructor(
    private readonly paymentMethods: PaymentMethodRepositoryPort,
    handlers: Record<string, PaymentHandler> = {},
  ) {
    for (const [identifier, handler] of Object.entries(handlers)) {
      this.register(identifier, handler);
    }
  }

  register(identifier: string, handler: PaymentHandler): void {
    this.handlers.set(identifier, handler);
  }

  async resolve(paymentMethodId: string): Promise<ResolvedPaymentHandler | null> {
    const paymentMethod = await this.paymentMethods.getPaymentMethodById(paymentMethodId);
    if (!paymentMethod?.active) {
      return null;
    }

    const identifier = this.handlerIdentifierOf(paymentMethod);
    if (identifier === null) {
      return null;
    }
    const handler = this.handlers.get(identifier);
    if (!handler) {
      return null;
    }

    const capabilities = capabilitiesOf(handler);
    if (handler.kind === "modern") {
      return { generation: "modern", paymentMethodId, handler, capabilities };
    }
    return { generation: "legacy", paymentMethodId, handler, capabilities };
  }

  private handlerIdentifierOf(paymentMethod: PaymentMethodRecord): string | null {
    const app = paymentMethod.app_payment_method;
    if (!app) {
      return paymentMethod.handler_identifier;
    }
    if (!app.app_active) {
      return null;
    }
    return appHandlerIdentifier(app.app_name, app.identifier);
  }
}
