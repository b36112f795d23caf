import { mkdirSync } from 'fs';
import { join, resolve } from 'path';

import { type EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

export const IN_MEMORY_DATABASE = ':memory:';

export const METADATA_DATABASE_FILE_NAME = 'metadata.db';

// Creates the storage directory on first use and returns the path a
// database file should be opened at.
export const resolveStorageDatabasePath = (
  environmentService: EnvironmentService,
  fileName: string,
): string => {
  if (environmentService.isInMemoryStorage()) {
    return IN_MEMORY_DATABASE;
  }

  const storageDirectory = resolve(
    environmentService.get('API_DATA_STORAGE_DIR'),
  );

  mkdirSync(storageDirectory, { recursive: true });

  return join(storageDirectory, fileName);
};
