// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
  prefix?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    // One registry per client so several clients can live in one process
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics(config.prefix ?? 'dracoon_');
    }
  }

  private initializeMetrics(prefix: string): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: `${prefix}http_requests_total`,
        help: 'Total API requests',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: `${prefix}http_request_duration_seconds`,
        help: 'API request duration',
        labelNames: ['method', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: `${prefix}http_errors_total`,
        help: 'API request failures by error kind',
        labelNames: ['kind'],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'dispatch_queue_size',
      new Gauge({
        name: `${prefix}dispatch_queue_size`,
        help: 'Requests waiting for a dispatch slot',
        registers: [this.registry],
      })
    );

    // Session metrics
    this.counters.set(
      'session_established',
      new Counter({
        name: `${prefix}session_established_total`,
        help: 'Successful grant exchanges',
        labelNames: ['grant'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'session_probe',
      new Counter({
        name: `${prefix}session_probe_total`,
        help: 'Live session probes',
        labelNames: ['result'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_total',
      new Counter({
        name: `${prefix}token_refresh_total`,
        help: 'Refresh exchanges',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_dedup',
      new Counter({
        name: `${prefix}token_refresh_dedup_total`,
        help: 'Callers that joined a refresh already in flight',
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'token_refresh_duration',
      new Histogram({
        name: `${prefix}token_refresh_duration_seconds`,
        help: 'Refresh exchange duration',
        labelNames: ['status'],
        buckets: [0.1, 0.3, 0.5, 1, 2],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number> = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(
    name: string,
    durationMs: number,
    labels: Record<string, string | number> = {}
  ): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number> = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
