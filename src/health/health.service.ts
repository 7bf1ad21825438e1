// src/health/health.service.ts
import { Injectable } from '@nestjs/common';

import { ModelStoreService } from '../model/model-store.service';
import { MetricsRegistry } from '../monitoring/metrics.registry';
import { RequestLogService } from '../monitoring/request-log.service';

export type HealthState = 'starting' | 'ready' | 'degraded' | 'failed';

export interface HealthReport {
  status: HealthState;
  modelLoaded: boolean;
  modelVersion: string | null;
  // load failure cause, or the request log's last write error
  error: string | null;
  requestLog: 'ok' | 'failing';
  uptimeSeconds: number;
  timestamp: string;
}

/**
 * Derives the service state from the model store and the request log on
 * every query; nothing is cached, so a report is never stale.
 */
@Injectable()
export class HealthService {
  private readonly startedAt = Date.now();
  private classesDeclared = false;

  constructor(
    private readonly store: ModelStoreService,
    private readonly requestLog: RequestLogService,
    metrics: MetricsRegistry,
  ) {
    metrics.addCollector(() => {
      const ready = this.store.isReady();
      metrics.modelLoaded.set({}, ready ? 1 : 0);
      if (ready && !this.classesDeclared) {
        metrics.declareClasses(this.store.classes());
        this.classesDeclared = true;
      }
    });
  }

  state(): HealthState {
    switch (this.store.status()) {
      case 'starting':
        return 'starting';
      case 'failed':
        return 'failed';
      case 'ready':
        return this.requestLog.isHealthy() ? 'ready' : 'degraded';
    }
  }

  /** Whether a load balancer should route traffic here */
  isServing(state: HealthState = this.state()): boolean {
    return state === 'ready' || state === 'degraded';
  }

  report(now = new Date()): HealthReport {
    const status = this.state();
    const ready = this.store.isReady();

    return {
      status,
      modelLoaded: ready,
      modelVersion: ready ? this.store.version() : null,
      error: this.store.failure() ?? this.requestLog.lastError(),
      requestLog: this.requestLog.isHealthy() ? 'ok' : 'failing',
      uptimeSeconds: Math.round((now.getTime() - this.startedAt) / 1000),
      timestamp: now.toISOString(),
    };
  }
}
