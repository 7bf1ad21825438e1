import { Module } from '@nestjs/common';

import { MetricsController } from './metrics.controller';
import { MetricsRegistry } from './metrics.registry';
import { RequestLogInterceptor } from './request-log.interceptor';
import { RequestLogService } from './request-log.service';

@Module({
  controllers: [MetricsController],
  providers: [MetricsRegistry, RequestLogService, RequestLogInterceptor],
  exports: [MetricsRegistry, RequestLogService, RequestLogInterceptor],
})
export class MonitoringModule {}
