import { WebhookResult } from '../domain/enums';

/**
 * Latency histogram upper bounds, in milliseconds
 */
export const DEFAULT_LATENCY_BUCKETS_MS: readonly number[] = [
  10, 50, 100, 500, 1000, 5000,
];

interface LatencyHistogram {
  /**
   * Cumulative count per bucket, aligned with the bucket bounds
   */
  buckets: number[];
  sum: number;
  count: number;
}

export interface MetricsSnapshot {
  httpRequests: Array<{ path: string; status: number; count: number }>;
  webhookResults: Record<WebhookResult, number>;
  latency: Array<{ path: string; count: number; sum: number }>;
}

/**
 * Process-wide request and ingestion counters
 *
 * Mutations are synchronous; export() never waits on a writer.
 */
export class MetricsRegistry {
  private readonly httpRequests = new Map<string, Map<number, number>>();
  private readonly webhookResults = new Map<WebhookResult, number>();
  private readonly latencies = new Map<string, LatencyHistogram>();
  private readonly bucketBounds: readonly number[];

  constructor(bucketBounds: readonly number[] = DEFAULT_LATENCY_BUCKETS_MS) {
    this.bucketBounds = [...bucketBounds].sort((a, b) => a - b);
    this.seedWebhookResults();
  }

  /**
   * Count one HTTP request and observe its latency
   */
  recordRequest(endpoint: string, statusCode: number, latencyMs: number): void {
    let byStatus = this.httpRequests.get(endpoint);
    if (!byStatus) {
      byStatus = new Map();
      this.httpRequests.set(endpoint, byStatus);
    }
    byStatus.set(statusCode, (byStatus.get(statusCode) ?? 0) + 1);

    const histogram =
      this.latencies.get(endpoint) ?? this.createHistogram(endpoint);

    const observed = Math.max(0, latencyMs);
    this.bucketBounds.forEach((bound, index) => {
      if (observed <= bound) {
        histogram.buckets[index]++;
      }
    });
    histogram.sum += observed;
    histogram.count++;
  }

  /**
   * Count one webhook ingestion outcome
   */
  recordWebhookResult(result: WebhookResult): void {
    this.webhookResults.set(result, (this.webhookResults.get(result) ?? 0) + 1);
  }

  /**
   * Render all series in Prometheus text exposition format
   */
  export(): string {
    const lines: string[] = [];

    lines.push('# HELP http_requests_total Total HTTP requests by path and status');
    lines.push('# TYPE http_requests_total counter');
    for (const { path, status, count } of this.sortedRequests()) {
      lines.push(
        `http_requests_total{path="${escapeLabel(path)}",status="${status}"} ${count}`,
      );
    }
    lines.push('');

    lines.push('# HELP webhook_requests_total Webhook ingestion outcomes by result');
    lines.push('# TYPE webhook_requests_total counter');
    for (const result of Object.values(WebhookResult)) {
      lines.push(
        `webhook_requests_total{result="${result}"} ${this.webhookResults.get(result) ?? 0}`,
      );
    }
    lines.push('');

    lines.push('# HELP request_latency_ms Request latency in milliseconds');
    lines.push('# TYPE request_latency_ms histogram');
    for (const path of [...this.latencies.keys()].sort()) {
      const histogram = this.latencies.get(path);
      if (!histogram) continue;
      const label = escapeLabel(path);

      this.bucketBounds.forEach((bound, index) => {
        lines.push(
          `request_latency_ms_bucket{path="${label}",le="${bound}"} ${histogram.buckets[index]}`,
        );
      });
      lines.push(
        `request_latency_ms_bucket{path="${label}",le="+Inf"} ${histogram.count}`,
      );
      lines.push(`request_latency_ms_sum{path="${label}"} ${histogram.sum}`);
      lines.push(`request_latency_ms_count{path="${label}"} ${histogram.count}`);
    }

    return lines.join('\n') + '\n';
  }

  /**
   * Structured copy of the current counters
   */
  snapshot(): MetricsSnapshot {
    const count = (result: WebhookResult): number =>
      this.webhookResults.get(result) ?? 0;

    return {
      httpRequests: this.sortedRequests(),
      webhookResults: {
        [WebhookResult.CREATED]: count(WebhookResult.CREATED),
        [WebhookResult.DUPLICATE]: count(WebhookResult.DUPLICATE),
        [WebhookResult.INVALID_SIGNATURE]: count(WebhookResult.INVALID_SIGNATURE),
        [WebhookResult.VALIDATION_ERROR]: count(WebhookResult.VALIDATION_ERROR),
        [WebhookResult.STORAGE_UNAVAILABLE]: count(WebhookResult.STORAGE_UNAVAILABLE),
      },
      latency: [...this.latencies.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([path, histogram]) => ({
          path,
          count: histogram.count,
          sum: histogram.sum,
        })),
    };
  }

  /**
   * Reset all series
   */
  reset(): void {
    this.httpRequests.clear();
    this.latencies.clear();
    this.webhookResults.clear();
    this.seedWebhookResults();
  }

  private createHistogram(endpoint: string): LatencyHistogram {
    const histogram: LatencyHistogram = {
      buckets: this.bucketBounds.map(() => 0),
      sum: 0,
      count: 0,
    };
    this.latencies.set(endpoint, histogram);
    return histogram;
  }

  private seedWebhookResults(): void {
    for (const result of Object.values(WebhookResult)) {
      this.webhookResults.set(result, 0);
    }
  }

  private sortedRequests(): Array<{ path: string; status: number; count: number }> {
    const rows: Array<{ path: string; status: number; count: number }> = [];
    for (const [path, byStatus] of this.httpRequests) {
      for (const [status, count] of byStatus) {
        rows.push({ path, status, count });
      }
    }
    return rows.sort((a, b) =>
      a.path === b.path ? a.status - b.status : a.path < b.path ? -1 : 1,
    );
  }
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
