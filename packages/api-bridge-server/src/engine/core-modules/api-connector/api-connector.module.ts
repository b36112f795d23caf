import { Module } from '@nestjs/common';

import { ApiConfigModule } from 'src/engine/core-modules/api-config/api-config.module';
import { ApiConnectorFactory } from 'src/engine/core-modules/api-connector/services/api-connector.factory';
import { ResponseCodecModule } from 'src/engine/core-modules/response-codec/response-codec.module';

@Module({
  imports: [ApiConfigModule, ResponseCodecModule],
  providers: [ApiConnectorFactory],
  exports: [ApiConnectorFactory],
})
export class ApiConnectorModule {}
