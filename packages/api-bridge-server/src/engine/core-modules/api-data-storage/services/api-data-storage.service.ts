import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';

import { QueryFailedError, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';

import {
  ApiDataStorageException,
  ApiDataStorageExceptionCode,
} from 'src/engine/core-modules/api-data-storage/api-data-storage.exception';
import { ApiDataRecordEntity } from 'src/engine/core-modules/api-data-storage/entities/api-data-record.entity';
import { DataOperationEntity } from 'src/engine/core-modules/api-data-storage/entities/data-operation.entity';
import { StorageSessionEntity } from 'src/engine/core-modules/api-data-storage/entities/storage-session.entity';
import { SessionRecordStoreManager } from 'src/engine/core-modules/api-data-storage/services/session-record-store.manager';
import { SessionWriteLock } from 'src/engine/core-modules/api-data-storage/services/session-write-lock';
import { type DataOperation } from 'src/engine/core-modules/api-data-storage/types/data-operation.type';
import {
  type CreateStorageSessionInput,
  type StorageSession,
} from 'src/engine/core-modules/api-data-storage/types/storage-session.type';
import {
  type AppendRecordInput,
  type AppendResult,
  type ListRecordsOptions,
  type StoredRecord,
} from 'src/engine/core-modules/api-data-storage/types/stored-record.type';
import { buildSessionFileName } from 'src/engine/core-modules/api-data-storage/utils/build-session-file-name.util';
import { computeContentHash } from 'src/engine/core-modules/api-data-storage/utils/compute-content-hash.util';
import { flattenStoredRecords } from 'src/engine/core-modules/api-data-storage/utils/flatten-stored-records.util';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredMap } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';
import { parseStructuredJson } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';
import { getErrorMessage } from 'src/utils/get-error-message.util';

const HASH_PREFIX_LENGTH = 8;

const isUniqueConstraintError = (error: unknown) =>
  error instanceof QueryFailedError &&
  error.message.includes('UNIQUE constraint failed');

@Injectable()
export class ApiDataStorageService {
  private readonly logger = new Logger(ApiDataStorageService.name);

  constructor(
    @InjectRepository(StorageSessionEntity)
    private readonly sessionRepository: Repository<StorageSessionEntity>,
    @InjectRepository(DataOperationEntity)
    private readonly operationRepository: Repository<DataOperationEntity>,
    private readonly sessionRecordStoreManager: SessionRecordStoreManager,
    private readonly sessionWriteLock: SessionWriteLock,
  ) {}

  private toStorageSession(entity: StorageSessionEntity): StorageSession {
    return {
      id: entity.id,
      name: entity.name,
      description: entity.description,
      apiName: entity.apiName,
      endpointName: entity.endpointName,
      fileName: entity.fileName,
      totalRecords: entity.totalRecords,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
      lastOperationAt: entity.lastOperationAt,
    };
  }

  private toStoredRecord(entity: ApiDataRecordEntity): StoredRecord {
    const sourceParams =
      entity.sourceParams === null
        ? null
        : parseStructuredJson(entity.sourceParams);

    return {
      id: entity.id,
      contentHash: entity.contentHash,
      rawValue: parseStructuredJson(entity.rawValue),
      processedValue:
        entity.processedValue === null
          ? null
          : parseStructuredJson(entity.processedValue),
      sourceParams: isStructuredMap(sourceParams) ? sourceParams : null,
      timestamp: entity.createdAt,
    };
  }

  private toDataOperation(entity: DataOperationEntity): DataOperation {
    return {
      id: entity.id,
      sessionId: entity.sessionId,
      operationType: entity.operationType,
      recordsAffected: entity.recordsAffected,
      details: entity.details,
      createdAt: entity.createdAt,
    };
  }

  async createSession({
    name,
    apiName,
    endpointName,
    description,
  }: CreateStorageSessionInput): Promise<StorageSession> {
    const id = uuidv4();
    const createdAt = new Date();
    const location = {
      sessionId: id,
      fileName: buildSessionFileName(apiName, endpointName, createdAt, id),
    };

    try {
      // Opening the record store creates its database and schema.
      await this.sessionRecordStoreManager.getRepository(location);

      const session = await this.sessionRepository.manager.transaction(
        async (manager) => {
          const created = await manager.save(
            manager.create(StorageSessionEntity, {
              id,
              name,
              description: description ?? null,
              apiName,
              endpointName,
              fileName: location.fileName,
              totalRecords: 0,
              createdAt,
              updatedAt: createdAt,
              lastOperationAt: createdAt,
            }),
          );

          await manager.insert(DataOperationEntity, {
            sessionId: id,
            operationType: 'create_session',
            recordsAffected: 0,
            details: `Created session ${name}`,
            createdAt,
          });

          return created;
        },
      );

      this.logger.log(`Created storage session ${name} (${id})`);

      return this.toStorageSession(session);
    } catch (error) {
      await this.sessionRecordStoreManager.drop(location);

      throw new ApiDataStorageException(
        `Failed to create storage session ${name}: ${getErrorMessage(error)}`,
        ApiDataStorageExceptionCode.SESSION_CREATE_ERROR,
      );
    }
  }

  // A value whose canonical form is already stored is not stored again, but
  // the attempt is still written to the operation log.
  async append(
    sessionId: string,
    { rawValue, processedValue, sourceParams }: AppendRecordInput,
  ): Promise<AppendResult> {
    return this.sessionWriteLock.runExclusive(sessionId, async () => {
      const session = await this.findSessionEntityOrThrow(sessionId);
      const contentHash = computeContentHash(rawValue);
      let recordRepository: Repository<ApiDataRecordEntity> | null = null;
      let recordsAdded = 0;

      try {
        recordRepository = await this.sessionRecordStoreManager.getRepository({
          sessionId,
          fileName: session.fileName,
        });

        recordsAdded = await this.insertRecordIfAbsent(recordRepository, {
          contentHash,
          rawValue: JSON.stringify(rawValue),
          processedValue:
            processedValue === undefined ? null : JSON.stringify(processedValue),
          sourceParams:
            sourceParams === undefined ? null : JSON.stringify(sourceParams),
          createdAt: new Date(),
        });

        await this.recordAppend(sessionId, contentHash, recordsAdded);

        return { recordsAdded, contentHash };
      } catch (error) {
        // The record and the session counters live in different databases:
        // a record whose metadata write failed must not stay behind.
        if (recordRepository !== null && recordsAdded > 0) {
          await this.discardRecord(recordRepository, sessionId, contentHash);
        }

        throw new ApiDataStorageException(
          `Failed to store data in session ${sessionId}: ${getErrorMessage(error)}`,
          ApiDataStorageExceptionCode.STORAGE_WRITE_ERROR,
        );
      }
    });
  }

  // Newest first.
  async listRecords(
    sessionId: string,
    { limit, offset }: ListRecordsOptions = {},
  ): Promise<StoredRecord[]> {
    // Under the session lock so a concurrent delete cannot leave a reopened
    // record database behind.
    return this.sessionWriteLock.runExclusive(sessionId, async () => {
      const session = await this.findSessionEntityOrThrow(sessionId);
      const recordRepository =
        await this.sessionRecordStoreManager.getRepository({
          sessionId,
          fileName: session.fileName,
        });

      const records = await recordRepository.find({
        order: { createdAt: 'DESC', id: 'DESC' },
        take: limit,
        skip: offset,
      });

      return records.map((record) => this.toStoredRecord(record));
    });
  }

  async listTabularRows(
    sessionId: string,
    options: ListRecordsOptions = {},
  ): Promise<StructuredMap[]> {
    return flattenStoredRecords(await this.listRecords(sessionId, options));
  }

  async listSessions(): Promise<StorageSession[]> {
    const sessions = await this.sessionRepository.find({
      order: { createdAt: 'DESC' },
    });

    return sessions.map((session) => this.toStorageSession(session));
  }

  async getSession(sessionId: string): Promise<StorageSession | null> {
    const session = await this.sessionRepository.findOneBy({ id: sessionId });

    return session ? this.toStorageSession(session) : null;
  }

  async getSessionOperations(sessionId: string): Promise<DataOperation[]> {
    await this.findSessionEntityOrThrow(sessionId);

    const operations = await this.operationRepository.find({
      where: { sessionId },
      order: { createdAt: 'DESC', id: 'DESC' },
    });

    return operations.map((operation) => this.toDataOperation(operation));
  }

  async deleteSession(sessionId: string): Promise<StorageSession> {
    return this.sessionWriteLock.runExclusive(sessionId, async () => {
      const session = await this.findSessionEntityOrThrow(sessionId);

      await this.sessionRecordStoreManager.drop({
        sessionId,
        fileName: session.fileName,
      });

      await this.sessionRepository.manager.transaction(async (manager) => {
        await manager.delete(DataOperationEntity, { sessionId });
        await manager.delete(StorageSessionEntity, { id: sessionId });
      });

      this.logger.log(`Deleted storage session ${session.name} (${sessionId})`);

      return this.toStorageSession(session);
    });
  }

  private async findSessionEntityOrThrow(
    sessionId: string,
  ): Promise<StorageSessionEntity> {
    const session = await this.sessionRepository.findOneBy({ id: sessionId });

    if (!session) {
      throw new ApiDataStorageException(
        `Storage session not found: ${sessionId}`,
        ApiDataStorageExceptionCode.SESSION_NOT_FOUND,
      );
    }

    return session;
  }

  private async insertRecordIfAbsent(
    recordRepository: Repository<ApiDataRecordEntity>,
    record: Omit<ApiDataRecordEntity, 'id'>,
  ): Promise<number> {
    if (await recordRepository.existsBy({ contentHash: record.contentHash })) {
      return 0;
    }

    try {
      await recordRepository.insert(record);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        return 0;
      }

      throw error;
    }

    return 1;
  }

  private async discardRecord(
    recordRepository: Repository<ApiDataRecordEntity>,
    sessionId: string,
    contentHash: string,
  ) {
    try {
      await recordRepository.delete({ contentHash });
    } catch (error) {
      this.logger.error(
        `Failed to discard record ${contentHash.slice(0, HASH_PREFIX_LENGTH)} from session ${sessionId}: ${getErrorMessage(error)}`,
      );
    }
  }

  private async recordAppend(
    sessionId: string,
    contentHash: string,
    recordsAdded: number,
  ) {
    const now = new Date();
    const hashPrefix = contentHash.slice(0, HASH_PREFIX_LENGTH);

    await this.sessionRepository.manager.transaction(async (manager) => {
      if (recordsAdded > 0) {
        await manager.increment(
          StorageSessionEntity,
          { id: sessionId },
          'totalRecords',
          recordsAdded,
        );
        await manager.update(
          StorageSessionEntity,
          { id: sessionId },
          { updatedAt: now, lastOperationAt: now },
        );
      } else {
        await manager.update(
          StorageSessionEntity,
          { id: sessionId },
          { lastOperationAt: now },
        );
      }

      await manager.insert(DataOperationEntity, {
        sessionId,
        operationType: 'store_data',
        recordsAffected: recordsAdded,
        details:
          recordsAdded > 0
            ? `Stored data with hash ${hashPrefix}`
            : `Skipped duplicate data with hash ${hashPrefix}`,
        createdAt: now,
      });
    });
  }
}
