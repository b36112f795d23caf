import { Module } from '@nestjs/common';

import { ApiConnectorModule } from 'src/engine/core-modules/api-connector/api-connector.module';
import { ApiDataStorageModule } from 'src/engine/core-modules/api-data-storage/api-data-storage.module';
import { ApiFetchService } from 'src/engine/core-modules/api-fetch/services/api-fetch.service';
import { DataTransformerModule } from 'src/engine/core-modules/data-transformer/data-transformer.module';

@Module({
  imports: [ApiConnectorModule, DataTransformerModule, ApiDataStorageModule],
  providers: [ApiFetchService],
  exports: [ApiFetchService],
})
export class ApiFetchModule {}
