import { Module } from '@nestjs/common';

import { ModelModule } from '../model/model.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [ModelModule, MonitoringModule],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
