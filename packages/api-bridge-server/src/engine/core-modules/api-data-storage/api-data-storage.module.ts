import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { DataOperationEntity } from 'src/engine/core-modules/api-data-storage/entities/data-operation.entity';
import { StorageSessionEntity } from 'src/engine/core-modules/api-data-storage/entities/storage-session.entity';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';
import { SessionRecordStoreManager } from 'src/engine/core-modules/api-data-storage/services/session-record-store.manager';
import { SessionWriteLock } from 'src/engine/core-modules/api-data-storage/services/session-write-lock';

@Module({
  imports: [
    TypeOrmModule.forFeature([StorageSessionEntity, DataOperationEntity]),
  ],
  providers: [
    ApiDataStorageService,
    SessionRecordStoreManager,
    SessionWriteLock,
  ],
  exports: [ApiDataStorageService],
})
export class ApiDataStorageModule {}
