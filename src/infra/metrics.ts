import type { CheckoutEvent } from "../domain/types.js";

export type PaymentFlow = "pay" | "finalize" | "validate" | "recurring";
export type PaymentFlowOutcome = "completed" | "redirect" | "failed" | "skipped";

type Labels<TName extends string> = Record<TName, string>;

const DURATION_BUCKETS_SECONDS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];

function renderLabels(pairs: Array<[string, string]>): string {
  if (pairs.length === 0) {
    return "";
  }
  const rendered = pairs.map(([name, value]) => {
    const escaped = value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
    return `${name}="${escaped}"`;
  });
  return `{${rendered.join(",")}}`;
}

/**
 * One time series per distinct label combination, rendered in first-seen order.
 */
class SeriesMap<TName extends string, TValue> {
  private readonly series = new Map<string, { pairs: Array<[string, string]>; value: TValue }>();

  constructor(private readonly labelNames: readonly TName[]) {}

  update(labels: Labels<TName>, initial: () => TValue, apply: (value: TValue) => TValue): void {
    const pairs = this.labelNames.map((name): [string, string] => [name, labels[name]]);
    const key = JSON.stringify(pairs.map(([, value]) => value));
    const current = this.series.get(key);
    this.series.set(key, { pairs, value: apply(current ? current.value : initial()) });
  }

  entries(): Array<{ pairs: Array<[string, string]>; value: TValue }> {
    return [...this.series.values()];
  }
}

class Counter<TName extends string> {
  private readonly series: SeriesMap<TName, number>;

  constructor(
    private readonly name: string,
    private readonly help: string,
    labelNames: readonly TName[],
  ) {
    this.series = new SeriesMap<TName, number>(labelNames);
  }

  inc(labels: Labels<TName>): void {
    this.series.update(labels, () => 0, (value) => value + 1);
  }

  render(): string[] {
    return [
      `# HELP ${this.name} ${this.help}`,
      `# TYPE ${this.name} counter`,
      ...this.series.entries().map(({ pairs, value }) => `${this.name}${renderLabels(pairs)} ${value}`),
    ];
  }
}

interface HistogramState {
  bucketCounts: number[];
  count: number;
  sum: number;
}

class Histogram<TName extends string> {
  private readonly series: SeriesMap<TName, HistogramState>;

  constructor(
    private readonly name: string,
    private readonly help: string,
    labelNames: readonly TName[],
    private readonly buckets: readonly number[],
  ) {
    this.series = new SeriesMap<TName, HistogramState>(labelNames);
  }

  observe(labels: Labels<TName>, observed: number): void {
    this.series.update(
      labels,
      () => ({ bucketCounts: this.buckets.map(() => 0), count: 0, sum: 0 }),
      (state) => ({
        bucketCounts: state.bucketCounts.map((count, index) => {
          const bound = this.buckets[index];
          return bound !== undefined && observed <= bound ? count + 1 : count;
        }),
        count: state.count + 1,
        sum: state.sum + observed,
      }),
    );
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const { pairs, value } of this.series.entries()) {
      this.buckets.forEach((bound, index) => {
        const labels = renderLabels([...pairs, ["le", String(bound)]]);
        lines.push(`${this.name}_bucket${labels} ${value.bucketCounts[index] ?? 0}`);
      });
      lines.push(`${this.name}_bucket${renderLabels([...pairs, ["le", "+Inf"]])} ${value.count}`);
      lines.push(`${this.name}_sum${renderLabels(pairs)} ${value.sum}`);
      lines.push(`${this.name}_count${renderLabels(pairs)} ${value.count}`);
    }
    return lines;
  }
}

/**
 * Process-local metrics exposed in the Prometheus text format on `/metrics`.
 */
export class CheckoutMetricsRegistry {
  private readonly httpRequests = new Counter(
    "checkout_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"] as const,
  );
  private readonly httpDuration = new Histogram(
    "checkout_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"] as const,
    DURATION_BUCKETS_SECONDS,
  );
  private readonly flowOutcomes = new Counter(
    "checkout_payment_flow_outcomes_total",
    "Total number of payment flow invocations by flow and outcome.",
    ["flow", "outcome"] as const,
  );
  private readonly transactionStates = new Counter(
    "checkout_order_transaction_state_total",
    "Total number of order transaction state changes by target state.",
    ["state"] as const,
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    const normalizedMethod = method.toUpperCase();
    this.httpRequests.inc({ method: normalizedMethod, route, status_code: String(statusCode) });
    this.httpDuration.observe({ method: normalizedMethod, route }, durationSeconds);
  }

  recordPaymentFlowOutcome(flow: PaymentFlow, outcome: PaymentFlowOutcome): void {
    this.flowOutcomes.inc({ flow, outcome });
  }

  recordTransactionEvent(eventType: CheckoutEvent["type"]): void {
    this.transactionStates.inc({ state: eventType.slice("order_transaction.".length) });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.flowOutcomes.render(),
      ...this.transactionStates.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
