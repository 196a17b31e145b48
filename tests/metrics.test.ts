import { describe, expect, it } from "vitest";
import { CheckoutMetricsRegistry } from "../src/infra/metrics.js";

describe("CheckoutMetricsRegistry", () => {
  it("renders counters per label set", () => {
    const metrics = new CheckoutMetricsRegistry();
    metrics.recordPaymentFlowOutcome("pay", "redirect");
    metrics.recordPaymentFlowOutcome("pay", "redirect");
    metrics.recordPaymentFlowOutcome("finalize", "failed");
    metrics.recordTransactionEvent("order_transaction.paid");

    const lines = metrics.renderPrometheus().split("\n");

    expect(lines).toContain("# TYPE checkout_payment_flow_outcomes_total counter");
    expect(lines).toContain('checkout_payment_flow_outcomes_total{flow="pay",outcome="redirect"} 2');
    expect(lines).toContain('checkout_payment_flow_outcomes_total{flow="finalize",outcome="failed"} 1');
    expect(lines).toContain('checkout_order_transaction_state_total{state="paid"} 1');
  });

  it("renders request duration buckets", () => {
    const metrics = new CheckoutMetricsRegistry();
    metrics.recordHttpRequest("post", "/v1/orders/:orderId/payment", 200, 0.03);

    const lines = metrics.renderPrometheus().split("\n");

    expect(lines).toContain(
      'checkout_http_requests_total{method="POST",route="/v1/orders/:orderId/payment",status_code="200"} 1',
    );
    expect(lines).toContain(
      'checkout_http_request_duration_seconds_bucket{method="POST",route="/v1/orders/:orderId/payment",le="0.025"} 0',
    );
    expect(lines).toContain(
      'checkout_http_request_duration_seconds_bucket{method="POST",route="/v1/orders/:orderId/payment",le="0.05"} 1',
    );
    expect(lines).toContain(
      'checkout_http_request_duration_seconds_bucket{method="POST",route="/v1/orders/:orderId/payment",le="+Inf"} 1',
    );
    expect(lines).toContain(
      'checkout_http_request_duration_seconds_count{method="POST",route="/v1/orders/:orderId/payment"} 1',
    );
  });

  it("escapes label values", () => {
    const metrics = new CheckoutMetricsRegistry();
    metrics.recordHttpRequest("GET", 'path"with\\quote', 404, 0.001);

    expect(metrics.renderPrometheus().split("\n")).toContain(
      'checkout_http_requests_total{method="GET",route="path\\"with\\\\quote",status_code="404"} 1',
    );
  });
});
