import { Test, type TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';

import { setTimeout as sleep } from 'timers/promises';

import { type Repository } from 'typeorm';

import { TypeORMModule } from 'src/database/typeorm/typeorm.module';
import { ApiDataStorageExceptionCode } from 'src/engine/core-modules/api-data-storage/api-data-storage.exception';
import { ApiDataStorageModule } from 'src/engine/core-modules/api-data-storage/api-data-storage.module';
import { StorageSessionEntity } from 'src/engine/core-modules/api-data-storage/entities/storage-session.entity';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';
import { computeContentHash } from 'src/engine/core-modules/api-data-storage/utils/compute-content-hash.util';
import { validateEnvironmentVariables } from 'src/engine/core-modules/environment/environment-variables';
import { EnvironmentModule } from 'src/engine/core-modules/environment/environment.module';
import { EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

const createWeatherSession = (service: ApiDataStorageService, name: string) =>
  service.createSession({
    name,
    apiName: 'weather',
    endpointName: 'current',
    description: 'test session',
  });

describe('ApiDataStorageService', () => {
  let module: TestingModule;
  let service: ApiDataStorageService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      imports: [EnvironmentModule, TypeORMModule, ApiDataStorageModule],
    })
      .overrideProvider(EnvironmentService)
      .useValue(
        new EnvironmentService(
          validateEnvironmentVariables({ API_DATA_STORAGE_DIR: ':memory:' }),
        ),
      )
      .compile();

    await module.init();
    service = module.get<ApiDataStorageService>(ApiDataStorageService);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await module.close();
  });

  describe('createSession', () => {
    it('should create an empty session and log the creation', async () => {
      const session = await createWeatherSession(service, 'first');

      expect(session).toEqual({
        id: expect.any(String),
        name: 'first',
        description: 'test session',
        apiName: 'weather',
        endpointName: 'current',
        fileName: expect.stringMatching(
          /^weather_current_\d{8}_\d{6}_[0-9a-f-]{8}\.db$/,
        ),
        totalRecords: 0,
        createdAt: expect.any(Date),
        updatedAt: expect.any(Date),
        lastOperationAt: expect.any(Date),
      });
      expect(session.fileName.endsWith(`${session.id.slice(0, 8)}.db`)).toBe(
        true,
      );

      const operations = await service.getSessionOperations(session.id);

      expect(operations).toEqual([
        {
          id: expect.any(Number),
          sessionId: session.id,
          operationType: 'create_session',
          recordsAffected: 0,
          details: 'Created session first',
          createdAt: expect.any(Date),
        },
      ]);
    });
  });

  describe('append', () => {
    it('should store values that differ only in key order once', async () => {
      const session = await createWeatherSession(service, 'dedup');
      const contentHash = computeContentHash({ a: 1, b: { c: 2, d: 3 } });

      await expect(
        service.append(session.id, { rawValue: { a: 1, b: { c: 2, d: 3 } } }),
      ).resolves.toEqual({ recordsAdded: 1, contentHash });
      await expect(
        service.append(session.id, { rawValue: { b: { d: 3, c: 2 }, a: 1 } }),
      ).resolves.toEqual({ recordsAdded: 0, contentHash });

      expect(await service.listRecords(session.id)).toHaveLength(1);
      expect((await service.getSession(session.id))?.totalRecords).toBe(1);
    });

    it('should still log a duplicate append', async () => {
      const session = await createWeatherSession(service, 'log');
      const hashPrefix = computeContentHash([1, 2]).slice(0, 8);

      await service.append(session.id, { rawValue: [1, 2] });
      await service.append(session.id, { rawValue: [1, 2] });

      const operations = await service.getSessionOperations(session.id);

      expect(
        operations.map(({ operationType, recordsAffected, details }) => ({
          operationType,
          recordsAffected,
          details,
        })),
      ).toEqual([
        {
          operationType: 'store_data',
          recordsAffected: 0,
          details: `Skipped duplicate data with hash ${hashPrefix}`,
        },
        {
          operationType: 'store_data',
          recordsAffected: 1,
          details: `Stored data with hash ${hashPrefix}`,
        },
        {
          operationType: 'create_session',
          recordsAffected: 0,
          details: 'Created session log',
        },
      ]);
    });

    it('should store a concurrent duplicate once', async () => {
      const session = await createWeatherSession(service, 'concurrent');

      const results = await Promise.all([
        service.append(session.id, { rawValue: { temp: 21 } }),
        service.append(session.id, { rawValue: { temp: 21 } }),
        service.append(session.id, { rawValue: { temp: 22 } }),
      ]);

      expect(results.map(({ recordsAdded }) => recordsAdded)).toEqual([
        1, 0, 1,
      ]);
      expect((await service.getSession(session.id))?.totalRecords).toBe(2);
    });

    it('should keep processed values and source params', async () => {
      const session = await createWeatherSession(service, 'details');

      await service.append(session.id, {
        rawValue: [{ temp: '21' }],
        processedValue: [{ temp: 21 }],
        sourceParams: { city: 'Oslo' },
      });

      expect(await service.listRecords(session.id)).toEqual([
        {
          id: 1,
          contentHash: computeContentHash([{ temp: '21' }]),
          rawValue: [{ temp: '21' }],
          processedValue: [{ temp: 21 }],
          sourceParams: { city: 'Oslo' },
          timestamp: expect.any(Date),
        },
      ]);
    });

    it('should not keep a record whose session update failed', async () => {
      const session = await createWeatherSession(service, 'rollback');
      const sessionRepository = module.get<Repository<StorageSessionEntity>>(
        getRepositoryToken(StorageSessionEntity),
      );

      jest
        .spyOn(sessionRepository.manager, 'transaction')
        .mockRejectedValueOnce(new Error('disk I/O error'));

      await expect(
        service.append(session.id, { rawValue: { a: 1 } }),
      ).rejects.toMatchObject({
        code: ApiDataStorageExceptionCode.STORAGE_WRITE_ERROR,
        message: `Failed to store data in session ${session.id}: disk I/O error`,
      });
      expect(await service.listRecords(session.id)).toEqual([]);

      await expect(
        service.append(session.id, { rawValue: { a: 1 } }),
      ).resolves.toEqual({
        recordsAdded: 1,
        contentHash: computeContentHash({ a: 1 }),
      });
      expect(await service.listRecords(session.id)).toHaveLength(1);
      expect((await service.getSession(session.id))?.totalRecords).toBe(1);
    });

    it('should fail for an unknown session', async () => {
      await expect(
        service.append('missing-session', { rawValue: 1 }),
      ).rejects.toMatchObject({
        code: ApiDataStorageExceptionCode.SESSION_NOT_FOUND,
      });
    });
  });

  describe('listRecords', () => {
    it('should return the newest records first within the page', async () => {
      const session = await createWeatherSession(service, 'paging');

      for (const n of [1, 2, 3]) {
        await service.append(session.id, { rawValue: { n } });
      }

      const values = async (options: { limit?: number; offset?: number }) =>
        (await service.listRecords(session.id, options)).map(
          ({ rawValue }) => rawValue,
        );

      expect(await values({})).toEqual([{ n: 3 }, { n: 2 }, { n: 1 }]);
      expect(await values({ limit: 2, offset: 1 })).toEqual([
        { n: 2 },
        { n: 1 },
      ]);
      expect(await values({ offset: 2 })).toEqual([{ n: 1 }]);
    });

    it('should wait for a pending delete of the same session', async () => {
      const session = await createWeatherSession(service, 'deleting');

      const [deleted, listed] = await Promise.allSettled([
        service.deleteSession(session.id),
        service.listRecords(session.id),
      ]);

      expect(deleted.status).toBe('fulfilled');
      expect(listed).toMatchObject({
        status: 'rejected',
        reason: { code: ApiDataStorageExceptionCode.SESSION_NOT_FOUND },
      });
    });

    it('should flatten records into tabular rows', async () => {
      const session = await createWeatherSession(service, 'rows');

      await service.append(session.id, { rawValue: { city: 'Oslo' } });
      await service.append(session.id, {
        rawValue: [{ city: 'Rome' }, { city: 'Lima' }, 5],
      });

      const [listRecord, mapRecord] = await service.listRecords(session.id);

      expect(await service.listTabularRows(session.id)).toEqual([
        {
          city: 'Rome',
          _id: '2_0',
          _timestamp: listRecord.timestamp.toISOString(),
        },
        {
          city: 'Lima',
          _id: '2_1',
          _timestamp: listRecord.timestamp.toISOString(),
        },
        {
          city: 'Oslo',
          _id: 1,
          _timestamp: mapRecord.timestamp.toISOString(),
        },
      ]);
    });
  });

  describe('listSessions', () => {
    it('should list the newest session first', async () => {
      await createWeatherSession(service, 'older');
      await sleep(5);
      await createWeatherSession(service, 'newer');

      expect(
        (await service.listSessions()).map(({ name }) => name),
      ).toEqual(['newer', 'older']);
    });
  });

  describe('deleteSession', () => {
    it('should remove the session with its records and operations', async () => {
      const session = await createWeatherSession(service, 'doomed');

      await service.append(session.id, { rawValue: { a: 1 } });

      await expect(service.deleteSession(session.id)).resolves.toMatchObject({
        id: session.id,
        name: 'doomed',
      });
      expect(await service.getSession(session.id)).toBeNull();
      await expect(service.listRecords(session.id)).rejects.toMatchObject({
        code: ApiDataStorageExceptionCode.SESSION_NOT_FOUND,
      });
      await expect(
        service.getSessionOperations(session.id),
      ).rejects.toMatchObject({
        code: ApiDataStorageExceptionCode.SESSION_NOT_FOUND,
      });
    });

    it('should report a missing session and leave others unchanged', async () => {
      const kept = await createWeatherSession(service, 'kept');

      await service.append(kept.id, { rawValue: { a: 1 } });
      await service.append(kept.id, { rawValue: { a: 2 } });

      await expect(service.deleteSession('missing-session')).rejects.toMatchObject(
        {
          code: ApiDataStorageExceptionCode.SESSION_NOT_FOUND,
          message: 'Storage session not found: missing-session',
        },
      );
      expect((await service.getSession(kept.id))?.totalRecords).toBe(2);
      expect(await service.listRecords(kept.id)).toHaveLength(2);
    });
  });
});
