import { Module } from '@nestjs/common';

import { ApiDescribeCommand } from 'src/command/commands/api-describe.command';
import { ApiFetchCommand } from 'src/command/commands/api-fetch.command';
import { ApiListCommand } from 'src/command/commands/api-list.command';
import { ApiPreviewCommand } from 'src/command/commands/api-preview.command';
import { ApiTestCommand } from 'src/command/commands/api-test.command';
import { ApiValidateCommand } from 'src/command/commands/api-validate.command';
import { StorageCreateSessionCommand } from 'src/command/commands/storage-create-session.command';
import { StorageDeleteSessionCommand } from 'src/command/commands/storage-delete-session.command';
import { StorageListSessionsCommand } from 'src/command/commands/storage-list-sessions.command';
import { StorageRecordsCommand } from 'src/command/commands/storage-records.command';
import { StorageSessionCommand } from 'src/command/commands/storage-session.command';
import { TypeORMModule } from 'src/database/typeorm/typeorm.module';
import { ApiConfigModule } from 'src/engine/core-modules/api-config/api-config.module';
import { ApiConnectorModule } from 'src/engine/core-modules/api-connector/api-connector.module';
import { ApiDataStorageModule } from 'src/engine/core-modules/api-data-storage/api-data-storage.module';
import { ApiFetchModule } from 'src/engine/core-modules/api-fetch/api-fetch.module';
import { DataTransformerModule } from 'src/engine/core-modules/data-transformer/data-transformer.module';
import { EnvironmentModule } from 'src/engine/core-modules/environment/environment.module';

@Module({
  imports: [
    EnvironmentModule,
    TypeORMModule,
    ApiConfigModule,
    ApiConnectorModule,
    DataTransformerModule,
    ApiDataStorageModule,
    ApiFetchModule,
  ],
  providers: [
    ApiListCommand,
    ApiValidateCommand,
    ApiTestCommand,
    ApiFetchCommand,
    ApiPreviewCommand,
    ApiDescribeCommand,
    StorageCreateSessionCommand,
    StorageListSessionsCommand,
    StorageSessionCommand,
    StorageRecordsCommand,
    StorageDeleteSessionCommand,
  ],
})
export class CommandModule {}
