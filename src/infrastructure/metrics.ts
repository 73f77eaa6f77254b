/**
 * Prometheus Metrics
 *
 * Counters, gauges and histograms for request traffic, ESPN latency and
 * compilation throughput, rendered in the text exposition format at
 * `GET /metrics`. No client library: the service exposes a handful of
 * series and nothing scrapes per-process defaults.
 */

export type Labels = Record<string, string>;

type MetricType = 'counter' | 'gauge' | 'histogram';

const registry: Array<{ render(): string }> = [];

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function formatLabels(labels: Labels): string {
  const pairs = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return pairs.length === 0 ? '' : `{${pairs.join(',')}}`;
}

/**
 * One named metric. Each distinct label set is a series; `sampleLines`
 * turns a series into its exposition lines.
 */
abstract class Metric<Series> {
  protected readonly series = new Map<string, Series>();

  constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: MetricType,
  ) {
    registry.push(this);
  }

  render(): string {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const [key, entry] of this.series) {
      lines.push(...this.sampleLines(key, entry));
    }
    return lines.join('\n');
  }

  protected abstract sampleLines(key: string, entry: Series): string[];
}

class Counter extends Metric<number> {
  constructor(name: string, help: string) {
    super(name, help, 'counter');
  }

  inc(labels: Labels = {}, amount = 1): void {
    const key = formatLabels(labels);
    this.series.set(key, (this.series.get(key) ?? 0) + amount);
  }

  protected sampleLines(key: string, value: number): string[] {
    return [`${this.name}${key} ${value}`];
  }
}

class Gauge extends Metric<number> {
  constructor(name: string, help: string) {
    super(name, help, 'gauge');
  }

  set(labels: Labels, value: number): void {
    this.series.set(formatLabels(labels), value);
  }

  protected sampleLines(key: string, value: number): string[] {
    return [`${this.name}${key} ${value}`];
  }
}

interface HistogramSeries {
  labels: Labels;
  count: number;
  sum: number;
  /** Cumulative count per upper bound, aligned with the histogram's buckets. */
  bucketCounts: number[];
}

const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

class Histogram extends Metric<HistogramSeries> {
  constructor(
    name: string,
    help: string,
    private readonly buckets: readonly number[] = LATENCY_BUCKETS_MS,
  ) {
    super(name, help, 'histogram');
  }

  observe(labels: Labels, value: number): void {
    const key = formatLabels(labels);
    const entry = this.series.get(key) ?? this.startSeries(key, labels);
    entry.count++;
    entry.sum += value;
    this.buckets.forEach((bound, index) => {
      if (value <= bound) entry.bucketCounts[index]++;
    });
  }

  private startSeries(key: string, labels: Labels): HistogramSeries {
    const entry: HistogramSeries = { labels, count: 0, sum: 0, bucketCounts: this.buckets.map(() => 0) };
    this.series.set(key, entry);
    return entry;
  }

  protected sampleLines(key: string, entry: HistogramSeries): string[] {
    const bucketLine = (le: string, count: number) =>
      `${this.name}_bucket${formatLabels({ ...entry.labels, le })} ${count}`;
    return [
      ...this.buckets.map((bound, index) => bucketLine(String(bound), entry.bucketCounts[index])),
      bucketLine('+Inf', entry.count),
      `${this.name}_sum${key} ${entry.sum}`,
      `${this.name}_count${key} ${entry.count}`,
    ];
  }
}

/** Render all registered metrics in Prometheus text exposition format. */
export function renderMetrics(): string {
  return registry.map((metric) => metric.render()).join('\n\n') + '\n';
}

// ─────────────────────────────────────────────────────────────────────────────
// Application Metrics
// ─────────────────────────────────────────────────────────────────────────────

export const httpRequestsTotal = new Counter(
  'season_stats_http_requests_total',
  'Total HTTP requests handled',
);

export const httpRequestDurationMs = new Histogram(
  'season_stats_http_request_duration_ms',
  'HTTP request latency in milliseconds',
);

/** Labelled by endpoint and outcome. A wait on an open circuit counts toward the call. */
export const externalApiDurationMs = new Histogram(
  'season_stats_external_api_duration_ms',
  'External API call latency in milliseconds',
  [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
);

export const gamesProcessedTotal = new Counter(
  'season_stats_games_total',
  'Games handled by season compilation runs, by outcome',
);

export const rowsTouchedTotal = new Counter(
  'season_stats_rows_touched_total',
  'Aggregate rows created or updated, by category',
);

/** 0 = CLOSED, 1 = OPEN, 2 = HALF_OPEN */
export const circuitBreakerState = new Gauge(
  'season_stats_circuit_breaker_state',
  'Circuit breaker state (0=CLOSED, 1=OPEN, 2=HALF_OPEN)',
);
