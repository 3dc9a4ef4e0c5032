import { Module } from '@nestjs/common';
import { BUFFER_POOL, ReusableBufferPool } from './buffer-pool';
import { ImageOptimizerService } from './image-optimizer.service';
import { ImageUploadService } from './image-upload.service';

@Module({
  providers: [
    ImageOptimizerService,
    ImageUploadService,
    { provide: BUFFER_POOL, useFactory: () => new ReusableBufferPool() },
  ],
  exports: [ImageUploadService],
})
export class ImagesModule {}
