import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_INTERCEPTOR } from '@nestjs/core';
import configuration from './config/configuration';
import { AppController } from './app.controller';
import { HealthModule } from './health/health.module';
import { InferenceModule } from './inference/inference.module';
import { ModelModule } from './model/model.module';
import { MonitoringModule } from './monitoring/monitoring.module';
import { RequestLogInterceptor } from './monitoring/request-log.interceptor';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      expandVariables: true,
    }),
    ModelModule,
    MonitoringModule,
    HealthModule,
    InferenceModule,
  ],
  controllers: [AppController],
  providers: [{ provide: APP_INTERCEPTOR, useExisting: RequestLogInterceptor }],
})
export class AppModule {}
