import { Module } from '@nestjs/common';
import { ModelStoreService } from './model-store.service';

@Module({
  providers: [ModelStoreService],
  exports: [ModelStoreService],
})
export class ModelModule {}
