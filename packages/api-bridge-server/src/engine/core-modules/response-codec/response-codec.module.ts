import { Module } from '@nestjs/common';

import { ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';

@Module({
  providers: [ResponseCodecService],
  exports: [ResponseCodecService],
})
export class ResponseCodecModule {}
