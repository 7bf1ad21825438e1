import { Controller, Get, Header } from '@nestjs/common';

import {
  EXPOSITION_CONTENT_TYPE,
  MetricsRegistry,
  type MetricsSummary,
} from './metrics.registry';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsRegistry) {}

  /**
   * GET /metrics
   * Prometheus text exposition of every registered family.
   */
  @Get()
  @Header('Content-Type', EXPOSITION_CONTENT_TYPE)
  exposition(): string {
    return this.metrics.snapshot();
  }

  /**
   * GET /metrics/summary
   * Returns: { totalRequests, errors, errorRate, averageInferenceTimeMs, ... }
   */
  @Get('summary')
  summary(): MetricsSummary {
    return this.metrics.summary();
  }
}
