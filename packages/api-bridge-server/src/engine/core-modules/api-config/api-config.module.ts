import { Module } from '@nestjs/common';

import { ApiConfigService } from 'src/engine/core-modules/api-config/services/api-config.service';

@Module({
  providers: [ApiConfigService],
  exports: [ApiConfigService],
})
export class ApiConfigModule {}
