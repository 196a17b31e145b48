import type { CheckoutEvent } from "../domain/types.js";

export interface EventBusPort {
  publish(event: CheckoutEvent): Promise<void>;
  subscribe(handler: (event: CheckoutEvent) => Promise<void>): void;
}
