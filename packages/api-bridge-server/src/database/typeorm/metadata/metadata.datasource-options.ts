import { type DataSourceOptions } from 'typeorm';

import { CreateStorageSessionTables1760900000000 } from 'src/database/typeorm/metadata/migrations/1760900000000-create-storage-session-tables';
import {
  METADATA_DATABASE_FILE_NAME,
  resolveStorageDatabasePath,
} from 'src/database/typeorm/storage-directory.util';
import { DataOperationEntity } from 'src/engine/core-modules/api-data-storage/entities/data-operation.entity';
import { StorageSessionEntity } from 'src/engine/core-modules/api-data-storage/entities/storage-session.entity';
import { type EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

export const buildMetadataDataSourceOptions = (
  environmentService: EnvironmentService,
): DataSourceOptions => ({
  type: 'better-sqlite3',
  database: resolveStorageDatabasePath(
    environmentService,
    METADATA_DATABASE_FILE_NAME,
  ),
  entities: [StorageSessionEntity, DataOperationEntity],
  migrations: [CreateStorageSessionTables1760900000000],
  migrationsRun: true,
  synchronize: false,
  logging: false,
});
