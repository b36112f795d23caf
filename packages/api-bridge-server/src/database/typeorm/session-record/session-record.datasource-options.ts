import { type DataSourceOptions } from 'typeorm';

import { CreateApiDataTable1760900000001 } from 'src/database/typeorm/session-record/migrations/1760900000001-create-api-data-table';
import { ApiDataRecordEntity } from 'src/engine/core-modules/api-data-storage/entities/api-data-record.entity';

export const buildSessionRecordDataSourceOptions = (
  database: string,
): DataSourceOptions => ({
  type: 'better-sqlite3',
  database,
  entities: [ApiDataRecordEntity],
  migrations: [CreateApiDataTable1760900000001],
  migrationsRun: true,
  synchronize: false,
  logging: false,
});
