import { Module } from '@nestjs/common';

import { DataTransformerService } from 'src/engine/core-modules/data-transformer/services/data-transformer.service';
import { ResponseCodecModule } from 'src/engine/core-modules/response-codec/response-codec.module';

@Module({
  imports: [ResponseCodecModule],
  providers: [DataTransformerService],
  exports: [DataTransformerService],
})
export class DataTransformerModule {}
