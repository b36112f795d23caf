import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';

import { rm } from 'fs/promises';

import { DataSource, type Repository } from 'typeorm';

import { buildSessionRecordDataSourceOptions } from 'src/database/typeorm/session-record/session-record.datasource-options';
import {
  IN_MEMORY_DATABASE,
  resolveStorageDatabasePath,
} from 'src/database/typeorm/storage-directory.util';
import { ApiDataRecordEntity } from 'src/engine/core-modules/api-data-storage/entities/api-data-record.entity';
import { EnvironmentService } from 'src/engine/core-modules/environment/environment.service';
import { getErrorMessage } from 'src/utils/get-error-message.util';

type SessionRecordStoreLocation = {
  sessionId: string;
  fileName: string;
};

// Owns one record database per session, opened lazily and kept open until
// the session is dropped or the module shuts down.
@Injectable()
export class SessionRecordStoreManager implements OnModuleDestroy {
  private readonly logger = new Logger(SessionRecordStoreManager.name);
  private readonly dataSources = new Map<string, Promise<DataSource>>();

  constructor(private readonly environmentService: EnvironmentService) {}

  async getRepository(
    location: SessionRecordStoreLocation,
  ): Promise<Repository<ApiDataRecordEntity>> {
    const dataSource = await this.getDataSource(location);

    return dataSource.getRepository(ApiDataRecordEntity);
  }

  async drop({ sessionId, fileName }: SessionRecordStoreLocation) {
    await this.close(sessionId);

    const databasePath = resolveStorageDatabasePath(
      this.environmentService,
      fileName,
    );

    if (databasePath !== IN_MEMORY_DATABASE) {
      await rm(databasePath, { force: true });
    }
  }

  async onModuleDestroy() {
    await Promise.all(
      [...this.dataSources.keys()].map((sessionId) => this.close(sessionId)),
    );
  }

  private getDataSource({
    sessionId,
    fileName,
  }: SessionRecordStoreLocation): Promise<DataSource> {
    const existing = this.dataSources.get(sessionId);

    if (existing) {
      return existing;
    }

    const dataSource = new DataSource(
      buildSessionRecordDataSourceOptions(
        resolveStorageDatabasePath(this.environmentService, fileName),
      ),
    );
    const initialized = dataSource.initialize().catch((error: unknown) => {
      this.dataSources.delete(sessionId);

      throw error;
    });

    this.dataSources.set(sessionId, initialized);

    return initialized;
  }

  private async close(sessionId: string) {
    const pending = this.dataSources.get(sessionId);

    if (!pending) {
      return;
    }

    this.dataSources.delete(sessionId);

    try {
      const dataSource = await pending;

      await dataSource.destroy();
    } catch (error) {
      this.logger.warn(
        `Failed to close record store of session ${sessionId}: ${getErrorMessage(error)}`,
      );
    }
  }
}
