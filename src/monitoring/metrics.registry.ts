// src/monitoring/metrics.registry.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { messageOf } from '../common/error-message';
import {
  Counter,
  DEFAULT_LATENCY_BUCKETS,
  Gauge,
  Histogram,
  type MetricFamily,
} from './metric-families';

export type PredictionOutcome = 'success' | 'failure' | 'cancelled';

/** One finished Predictor call */
export interface PredictionEvent {
  outcome: PredictionOutcome;
  latencySeconds: number;
  // set on success
  label?: string;
  // set on failure/cancel, e.g. 'InvalidImage'
  errorKind?: string;
}

export interface HttpEvent {
  method: string;
  route: string;
  status: number;
}

export interface MetricsSummary {
  totalRequests: number;
  successes: number;
  errors: number;
  cancelled: number;
  errorRate: number;
  averageInferenceTimeMs: number;
  totalInferenceTimeS: number;
  predictions: Record<string, number>;
  modelLoaded: boolean;
}

type Collector = () => void;

export const EXPOSITION_CONTENT_TYPE =
  'text/plain; version=0.0.4; charset=utf-8';

/**
 * Process-wide metrics for the classifier.
 *
 * Every mutation finishes inside one synchronous call, so on the single JS
 * thread two requests can never interleave inside an update: no torn reads,
 * no lost increments. `snapshot()` reads the same maps without locking
 * writers out.
 */
@Injectable()
export class MetricsRegistry {
  private readonly logger = new Logger(MetricsRegistry.name);
  private readonly families = new Map<string, MetricFamily>();
  private readonly collectors: Collector[] = [];
  private readonly prefix: string;

  readonly requests: Counter;
  readonly errors: Counter;
  readonly latency: Histogram;
  readonly predictions: Counter;
  readonly modelLoaded: Gauge;
  readonly httpRequests: Counter;

  constructor(config: ConfigService) {
    this.prefix = config.get<string>('metrics.prefix') ?? 'classifier_';

    this.requests = this.counter(
      'inference_requests_total',
      'Calls into the inference core, by outcome; uploads rejected before ' +
        'decoding are only counted in http_requests_total',
      ['outcome'],
    );
    this.errors = this.counter(
      'inference_errors_total',
      'Failed or cancelled predictions, by error kind',
      ['kind'],
    );
    this.latency = this.histogram(
      'inference_latency_seconds',
      'Wall time of a prediction: decode, transform and forward pass',
      [],
      DEFAULT_LATENCY_BUCKETS,
    );
    this.predictions = this.counter(
      'predictions_total',
      'Successful predictions, by predicted class',
      ['class'],
    );
    this.modelLoaded = this.gauge(
      'model_loaded',
      '1 when the model artifact is loaded and serving, else 0',
    );
    this.httpRequests = this.counter(
      'http_requests_total',
      'HTTP requests served, by method, route and status code',
      ['method', 'route', 'status'],
    );

    const outcomes: PredictionOutcome[] = ['success', 'failure', 'cancelled'];
    for (const outcome of outcomes) this.requests.init({ outcome });
    this.modelLoaded.set({}, 0);
  }

  /* ----------------------------- Registration ---------------------------- */

  counter(
    name: string,
    help: string,
    labelNames: readonly string[] = [],
  ): Counter {
    return this.register(new Counter(this.prefix + name, help, labelNames));
  }

  gauge(name: string, help: string, labelNames: readonly string[] = []): Gauge {
    return this.register(new Gauge(this.prefix + name, help, labelNames));
  }

  histogram(
    name: string,
    help: string,
    labelNames: readonly string[] = [],
    buckets: readonly number[] = DEFAULT_LATENCY_BUCKETS,
  ): Histogram {
    return this.register(
      new Histogram(this.prefix + name, help, labelNames, buckets),
    );
  }

  /** Pre-create one series per class so every class shows up at zero */
  declareClasses(classes: readonly string[]): void {
    for (const label of classes) this.predictions.init({ class: label });
  }

  /** Callback run right before every snapshot (e.g. to refresh gauges) */
  addCollector(fn: Collector): void {
    this.collectors.push(fn);
  }

  /* ------------------------------ Recording ------------------------------ */

  /** Fold one prediction outcome in. Exactly one request increment per call. */
  recordPrediction(event: PredictionEvent): void {
    this.requests.inc({ outcome: event.outcome });
    this.latency.observe({}, Math.max(0, event.latencySeconds));
    if (event.outcome === 'success' && event.label !== undefined) {
      this.predictions.inc({ class: event.label });
    }
    if (event.outcome !== 'success') {
      this.errors.inc({ kind: event.errorKind ?? 'Unknown' });
    }
  }

  recordHttp(event: HttpEvent): void {
    this.httpRequests.inc({
      method: event.method,
      route: event.route,
      status: String(event.status),
    });
  }

  /* ------------------------------- Reading ------------------------------- */

  /** Text exposition of every family, in registration order */
  snapshot(): string {
    this.runCollectors();
    const lines: string[] = [];
    for (const family of this.families.values()) {
      lines.push(...family.render());
    }
    return lines.join('\n') + '\n';
  }

  summary(): MetricsSummary {
    this.runCollectors();
    const successes = this.requests.get({ outcome: 'success' });
    const failures = this.requests.get({ outcome: 'failure' });
    const cancelled = this.requests.get({ outcome: 'cancelled' });
    const total = successes + failures + cancelled;
    const latencySum = this.latency.sum();

    const predictions: Record<string, number> = {};
    for (const [label, count] of this.predictions.byLabel('class')) {
      predictions[label] = count;
    }

    return {
      totalRequests: total,
      successes,
      errors: failures,
      cancelled,
      errorRate: total > 0 ? failures / total : 0,
      averageInferenceTimeMs:
        total > 0 ? round2((latencySum / total) * 1000) : 0,
      totalInferenceTimeS: round2(latencySum),
      predictions,
      modelLoaded: this.modelLoaded.get() === 1,
    };
  }

  /* ------------------------------- Helpers ------------------------------ */

  private register<T extends MetricFamily>(family: T): T {
    if (this.families.has(family.name)) {
      throw new Error(`Metric ${family.name} is already registered`);
    }
    this.families.set(family.name, family);
    return family;
  }

  private runCollectors(): void {
    for (const fn of this.collectors) {
      try {
        fn();
      } catch (error) {
        this.logger.warn(`Metrics collector failed: ${messageOf(error)}`);
      }
    }
  }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
