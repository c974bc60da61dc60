import { Injectable } from '@nestjs/common';
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

import { AppConfigService } from '../config';

@Injectable()
export class MetricsService {
  readonly registry = new Registry();

  constructor(configService: AppConfigService) {
    if (configService.get('metrics.collectDefaultMetrics')) {
      collectDefaultMetrics({
        register: this.registry,
        gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
        eventLoopMonitoringPrecision: 10,
      });
    }
  }

  public readonly requestLatency = new Histogram({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['route', 'method', 'status'],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
    registers: [this.registry],
  });

  public readonly requestCount = new Counter({
    name: 'http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['route', 'method', 'status'],
    registers: [this.registry],
  });

  public readonly cacheHits = new Counter({
    name: 'rate_cache_hits_total',
    help: 'Total number of rate cache hits',
    registers: [this.registry],
  });

  public readonly cacheMisses = new Counter({
    name: 'rate_cache_misses_total',
    help: 'Total number of rate cache misses',
    registers: [this.registry],
  });

  public readonly cacheSize = new Gauge({
    name: 'rate_cache_size',
    help: 'Current number of entries in the rate cache',
    registers: [this.registry],
  });

  public readonly fetchLatency = new Histogram({
    name: 'source_fetch_duration_seconds',
    help: 'Duration of source rate fetches in seconds',
    labelNames: ['source'],
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 15, 30],
    registers: [this.registry],
  });

  public readonly fetchThroughput = new Counter({
    name: 'source_fetches_total',
    help: 'Total number of source rate fetches',
    labelNames: ['source', 'status'],
    registers: [this.registry],
  });

  public readonly rateLimitHits = new Counter({
    name: 'rate_limit_hits_total',
    help: 'Total number of rate limit (429) responses',
    labelNames: ['source'],
    registers: [this.registry],
  });

  public readonly sourceFailures = new Counter({
    name: 'source_failures_total',
    help: 'Source failures during rate resolution, by reason',
    labelNames: ['source', 'reason'],
    registers: [this.registry],
  });

  public readonly resolutions = new Counter({
    name: 'rate_resolutions_total',
    help: 'Rate resolutions by outcome (cache, source, fallback)',
    labelNames: ['outcome'],
    registers: [this.registry],
  });

  public readonly resolutionFailures = new Counter({
    name: 'rate_resolution_failures_total',
    help: 'Failed rate resolutions by error type',
    labelNames: ['type'],
    registers: [this.registry],
  });

  public readonly conversions = new Counter({
    name: 'conversions_total',
    help: 'Completed currency conversions',
    labelNames: ['status'],
    registers: [this.registry],
  });
}
