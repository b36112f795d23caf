import { Injectable, Logger } from '@nestjs/common';

import { format } from 'date-fns';

import {
  ApiDataStorageException,
  ApiDataStorageExceptionCode,
} from 'src/engine/core-modules/api-data-storage/api-data-storage.exception';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';
import { type StorageSession } from 'src/engine/core-modules/api-data-storage/types/storage-session.type';
import { ApiConnectorFactory } from 'src/engine/core-modules/api-connector/services/api-connector.factory';
import { type ParsedApiResponse } from 'src/engine/core-modules/api-connector/types/api-call-result.type';
import {
  AUTO_SESSION_TIMESTAMP_FORMAT,
  INLINE_PREVIEW_MAX_LENGTH,
} from 'src/engine/core-modules/api-fetch/api-fetch.constants';
import {
  type FetchAndStoreInput,
  type FetchAndStoreResult,
} from 'src/engine/core-modules/api-fetch/types/fetch-and-store.type';
import {
  type DescribeApiDataInput,
  type DescribeApiDataResult,
  type PreviewApiDataInput,
  type PreviewApiDataResult,
} from 'src/engine/core-modules/api-fetch/types/preview-api-data.type';
import { DataTransformerService } from 'src/engine/core-modules/data-transformer/services/data-transformer.service';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredScalar } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const toInlinePreview = (data: StructuredValue): StructuredValue | null =>
  !isStructuredScalar(data) &&
  JSON.stringify(data).length < INLINE_PREVIEW_MAX_LENGTH
    ? data
    : null;

@Injectable()
export class ApiFetchService {
  private readonly logger = new Logger(ApiFetchService.name);

  constructor(
    private readonly apiConnectorFactory: ApiConnectorFactory,
    private readonly dataTransformerService: DataTransformerService,
    private readonly apiDataStorageService: ApiDataStorageService,
  ) {}

  // Calls the endpoint, optionally transforms the response data and appends
  // it to a storage session. The raw response data is what gets deduplicated.
  async fetchAndStore({
    apiName,
    endpointName,
    params = {},
    transform,
    sessionId,
  }: FetchAndStoreInput): Promise<FetchAndStoreResult> {
    const existingSession = sessionId
      ? await this.getSessionOrThrow(sessionId)
      : null;

    const response = await this.callEndpoint(apiName, endpointName, params);

    const report = transform
      ? this.dataTransformerService.applyWithReport(response.data, transform)
      : null;

    const session =
      existingSession ??
      (await this.apiDataStorageService.createSession({
        name: `${apiName}_${endpointName}_auto_${format(new Date(), AUTO_SESSION_TIMESTAMP_FORMAT)}`,
        apiName,
        endpointName,
        description: `Created automatically for ${apiName}.${endpointName}`,
      }));

    const { recordsAdded, contentHash } =
      await this.apiDataStorageService.append(session.id, {
        rawValue: response.data,
        processedValue: report?.value,
        sourceParams: params,
      });

    this.logger.log(
      `Stored ${recordsAdded} record(s) from ${apiName}.${endpointName} in session ${session.id}`,
    );

    return {
      apiName,
      endpointName,
      sessionId: session.id,
      sessionCreated: existingSession === null,
      recordsAdded,
      contentHash,
      statusCode: response.statusCode,
      attempts: response.attempts,
      parseError: response.parseError,
      skippedSteps: report?.skippedSteps ?? [],
      preview: toInlinePreview(response.data),
    };
  }

  async preview({
    apiName,
    endpointName,
    params = {},
    options = {},
  }: PreviewApiDataInput): Promise<PreviewApiDataResult> {
    const response = await this.callEndpoint(apiName, endpointName, params);

    return {
      apiName,
      endpointName,
      statusCode: response.statusCode,
      format: response.format,
      parseError: response.parseError,
      preview: this.dataTransformerService.preview(response.data, options),
    };
  }

  // Type, size, fields and a small sample of the response data.
  async describe({
    apiName,
    endpointName,
    params = {},
  }: DescribeApiDataInput): Promise<DescribeApiDataResult> {
    const response = await this.callEndpoint(apiName, endpointName, params);

    return {
      apiName,
      endpointName,
      statusCode: response.statusCode,
      format: response.format,
      parseError: response.parseError,
      description: this.dataTransformerService.describe(response.data),
    };
  }

  private async callEndpoint(
    apiName: string,
    endpointName: string,
    params: StructuredMap,
  ): Promise<ParsedApiResponse> {
    const connector = this.apiConnectorFactory.create(apiName);

    try {
      const result = await connector.call(endpointName, params);

      if (!result.success) {
        throw result.error;
      }

      return result.response;
    } finally {
      await connector.close();
    }
  }

  private async getSessionOrThrow(sessionId: string): Promise<StorageSession> {
    const session = await this.apiDataStorageService.getSession(sessionId);

    if (!session) {
      throw new ApiDataStorageException(
        `Storage session not found: ${sessionId}`,
        ApiDataStorageExceptionCode.SESSION_NOT_FOUND,
      );
    }

    return session;
  }
}
