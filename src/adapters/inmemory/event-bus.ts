import type { CheckoutEvent } from "../../domain/types.js";
import type { EventBusPort } from "../../ports/event-bus.js";

export class InMemoryEventBus implements EventBusPort {
  private readonly outbox: CheckoutEvent[] = [];
  private readonly subscribers: Array<(event: CheckoutEvent) => Promise<void>> = [];

  async publish(event: CheckoutEvent): Promise<void> {
    this.outbox.push(event);
    for (const subscriber of this.subscribers) {
      await subscriber(event);
    }
  }

  getPublishedEvents(): CheckoutEvent[] {
    return [...this.outbox];
  }

  subscribe(handler: (event: CheckoutEvent) => Promise<void>): void {
    this.subscribers.push(handler);
  }
}
