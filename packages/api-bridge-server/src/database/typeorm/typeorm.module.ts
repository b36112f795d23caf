import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { buildMetadataDataSourceOptions } from 'src/database/typeorm/metadata/metadata.datasource-options';
import { EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [EnvironmentService],
      useFactory: (environmentService: EnvironmentService) =>
        buildMetadataDataSourceOptions(environmentService),
    }),
  ],
})
export class TypeORMModule {}
