import type { PaymentMethodRecord } from "../domain/types.js";

export interface PaymentMethodRepositoryPort {
  savePaymentMethod(paymentMethod: PaymentMethodRecord): Promise<void>;
  getPaymentMethodById(id: string): Promise<PaymentMethodRecord | null>;
}
