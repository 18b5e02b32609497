import { Injectable, OnModuleInit } from '@nestjs/common';
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

const LATENCY_BUCKETS = [
  0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 15, 20, 30, 60,
];

@Injectable()
export class MetricsService implements OnModuleInit {
  /** Owned registry, so several application instances (tests) never collide. */
  readonly registry = new Registry();

  onModuleInit(): void {
    collectDefaultMetrics({
      register: this.registry,
      gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
      eventLoopMonitoringPrecision: 10,
    });
  }

  public readonly requestLatency = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['route', 'method', 'status'],
    buckets: LATENCY_BUCKETS,
    registers: [this.registry],
  });

  public readonly requestCount = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['route', 'method', 'status'],
    registers: [this.registry],
  });

  public readonly fetchLatency = new Histogram({
    name: 'source_fetch_duration_seconds',
    help: 'Duration of source fetches in seconds, retries included',
    labelNames: ['source'],
    buckets: [0.1, 0.5, 1, 2, 5, 10, 15, 20, 30, 45, 60],
    registers: [this.registry],
  });

  public readonly sourceApiErrors = new Counter({
    name: 'source_api_errors_total',
    help: 'Total number of API errors from external sources',
    labelNames: ['source', 'status_code', 'error_type'],
    registers: [this.registry],
  });

  public readonly rateLimitHits = new Counter({
    name: 'rate_limit_hits_total',
    help: 'Total number of rate limit (429) responses left after retries',
    labelNames: ['source'],
    registers: [this.registry],
  });

  public readonly quotesReceived = new Counter({
    name: 'quotes_received_total',
    help: 'Total number of normalized quotes returned by sources',
    labelNames: ['source'],
    registers: [this.registry],
  });

  public readonly aggregationWrites = new Counter({
    name: 'aggregation_writes_total',
    help: 'Averaged rates written by the aggregator',
    labelNames: ['currency', 'status'],
    registers: [this.registry],
  });

  public readonly latestBuyRate = new Gauge({
    name: 'averaged_buy_rate',
    help: 'Most recently written averaged buy rate',
    labelNames: ['currency'],
    registers: [this.registry],
  });

  public readonly latestSellRate = new Gauge({
    name: 'averaged_sell_rate',
    help: 'Most recently written averaged sell rate',
    labelNames: ['currency'],
    registers: [this.registry],
  });

  public readonly schedulerRuns = new Counter({
    name: 'scheduler_runs_total',
    help: 'Rate update triggers by outcome',
    labelNames: ['outcome'],
    registers: [this.registry],
  });

  public readonly schedulerRunDuration = new Histogram({
    name: 'scheduler_run_duration_seconds',
    help: 'Duration of rate update runs that actually executed',
    buckets: [0.1, 0.5, 1, 5, 10, 20, 30, 60, 120],
    registers: [this.registry],
  });

  public readonly cacheHits = new Counter({
    name: 'cache_hits_total',
    help: 'Total number of cache hits',
    labelNames: ['cache'],
    registers: [this.registry],
  });

  public readonly cacheMisses = new Counter({
    name: 'cache_misses_total',
    help: 'Total number of cache misses',
    labelNames: ['cache'],
    registers: [this.registry],
  });

  public readonly errorCount = new Counter({
    name: 'app_errors_total',
    help: 'Total number of application errors',
    labelNames: ['type'],
    registers: [this.registry],
  });

  recordWrite(currency: string, buyRate: number, sellRate: number): void {
    this.aggregationWrites.inc({ currency, status: 'success' });
    this.latestBuyRate.set({ currency }, buyRate);
    this.latestSellRate.set({ currency }, sellRate);
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
