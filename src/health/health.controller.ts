import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';

import { HealthService, type HealthReport } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly health: HealthService) {}

  /**
   * 200 while predictions are served (`ready`, `degraded`),
   * 503 with the same report otherwise
   */
  @Get()
  check(): HealthReport {
    const report = this.health.report();
    if (!this.health.isServing(report.status)) {
      throw new ServiceUnavailableException(report);
    }
    return report;
  }

  @Get('live')
  live() {
    return { ok: true };
  }
}
