import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

@Controller()
export class AppController {
  constructor(private readonly config: ConfigService) {}

  @Get()
  root() {
    return {
      service: 'pet-classifier-api',
      env: this.config.get<string>('nodeEnv'),
      version: 'v1',
      endpoints: {
        health: '/api/v1/health',
        predict: '/api/v1/predict',
        predictBatch: '/api/v1/predict/batch',
        modelInfo: '/api/v1/model-info',
        metrics: '/api/v1/metrics',
        metricsSummary: '/api/v1/metrics/summary',
      },
    };
  }
}
