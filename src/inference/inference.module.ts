import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';

import { ModelModule } from '../model/model.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { ImageTransformService } from './image-transform.service';
import { InferenceController } from './inference.controller';
import { PredictorService } from './predictor.service';

@Module({
  imports: [
    ModelModule,
    MonitoringModule,
    // uploads stay in memory; sharp reads straight from the buffer
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        storage: memoryStorage(),
        limits: {
          fileSize: config.get<number>('upload.maxBytes'),
          files: config.get<number>('upload.maxFiles'),
        },
      }),
    }),
  ],
  controllers: [InferenceController],
  providers: [ImageTransformService, PredictorService],
  exports: [PredictorService],
})
export class InferenceModule {}
