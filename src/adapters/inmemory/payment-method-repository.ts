import type { PaymentMethodRecord } from "../../domain/types.js";
import type { PaymentMethodRepositoryPort } from "../../ports/payment-method-repository.js";

export class InMemoryPaymentMethodRepository implements PaymentMethodRepositoryPort {
  private readonly paymentMethods = new Map<string, PaymentMethodRecord>();

  async savePaymentMethod(paymentMethod: PaymentMethodRecord): Promise<void> {
    this.paymentMethods.set(paymentMethod.id, paymentMethod);
  }

  async getPaymentMethodById(id: string): Promise<PaymentMethodRecord | null> {
    return this.paymentMethods.get(id) ?? null;
  }
}
