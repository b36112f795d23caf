import { Logger } from '@nestjs/common';

import { setTimeout as sleep } from 'timers/promises';

import { Agent, type Dispatcher, fetch, Headers } from 'undici';

import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';
import { type ApiConnectorSettings } from 'src/engine/core-modules/api-config/types/api-connector-settings.type';
import {
  ApiConnectorException,
  ApiConnectorExceptionCode,
} from 'src/engine/core-modules/api-connector/api-connector.exception';
import {
  type ApiCallResult,
  type ParsedApiResponse,
} from 'src/engine/core-modules/api-connector/types/api-call-result.type';
import { type ApiRequest } from 'src/engine/core-modules/api-connector/types/api-request.type';
import { type ConnectionTestResult } from 'src/engine/core-modules/api-connector/types/connection-test-result.type';
import { type EndpointDescriptor } from 'src/engine/core-modules/api-connector/types/endpoint-descriptor.type';
import {
  type HttpResponseOutcome,
  type RequestOutcome,
  type TransportFailureOutcome,
} from 'src/engine/core-modules/api-connector/types/request-outcome.type';
import {
  ACCEPT_HEADER_VALUE,
  buildApiRequest,
} from 'src/engine/core-modules/api-connector/utils/build-api-request.util';
import {
  buildHttpErrorMessage,
  ERROR_BODY_EXCERPT_LENGTH,
} from 'src/engine/core-modules/api-connector/utils/build-http-error-message.util';
import {
  classifyTransportError,
  describeTransportError,
} from 'src/engine/core-modules/api-connector/utils/classify-transport-error.util';
import { type ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type ApiConnectorOptions = {
  // Overrides the connector's own connection pool; the caller then owns it.
  dispatcher?: Dispatcher;
};

const roundMs = (value: number) => Math.round(value * 100) / 100;

// One connector per call site: it owns an undici Agent (its connection pool)
// that close() releases.
export class ApiConnector {
  private readonly logger = new Logger(ApiConnector.name);
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private closed = false;

  constructor(
    private readonly config: ApiConfig,
    private readonly settings: ApiConnectorSettings,
    private readonly responseCodecService: ResponseCodecService,
    { dispatcher }: ApiConnectorOptions = {},
  ) {
    this.ownsDispatcher = dispatcher === undefined;
    this.dispatcher =
      dispatcher ??
      new Agent({ connect: { rejectUnauthorized: settings.verifySsl } });
  }

  get apiName(): string {
    return this.config.name;
  }

  getEndpoints(): EndpointDescriptor[] {
    return Object.values(this.config.endpoints).map((endpoint) => ({
      name: endpoint.name,
      method: endpoint.method,
      path: endpoint.path,
      description: endpoint.description,
      parameters: endpoint.parameters,
      responseFormat: endpoint.responseFormat,
    }));
  }

  async call(
    endpointName: string,
    params: StructuredMap = {},
  ): Promise<ApiCallResult> {
    if (!Object.hasOwn(this.config.endpoints, endpointName)) {
      return {
        success: false,
        error: new ApiConnectorException(
          `Endpoint not found: ${this.config.name}.${endpointName}`,
          ApiConnectorExceptionCode.ENDPOINT_NOT_FOUND,
        ),
      };
    }

    let request: ApiRequest;

    try {
      request = buildApiRequest(
        this.config,
        this.config.endpoints[endpointName],
        params,
        this.settings.userAgent,
      );
    } catch (error) {
      return {
        success: false,
        error: new ApiConnectorException(
          `Could not build request: ${describeTransportError(error)}`,
          ApiConnectorExceptionCode.REQUEST_FAILED,
        ),
      };
    }

    const label = `${this.config.name}.${endpointName}`;
    const totalAttempts = this.settings.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      const outcome = await this.send(request);

      if (outcome.kind === 'response' && outcome.statusCode < 400) {
        this.logger.log(
          `API call succeeded: ${label} (status ${outcome.statusCode}, attempt ${attempt}/${totalAttempts})`,
        );

        return {
          success: true,
          response: this.toParsedResponse(outcome, attempt),
        };
      }

      const failure = this.toFailure(outcome, attempt);

      if (!this.isRetryable(outcome)) {
        this.logger.error(`API call failed: ${label} - ${failure.message}`);

        return { success: false, error: failure };
      }

      if (attempt >= totalAttempts) {
        this.logger.error(
          `API call failed after ${attempt} attempt(s): ${label} - ${failure.message}`,
        );

        return { success: false, error: failure };
      }

      this.logger.warn(
        `Attempt ${attempt}/${totalAttempts} failed for ${label}, retrying in ${this.settings.retryDelayMs}ms: ${failure.message}`,
      );

      await sleep(this.settings.retryDelayMs);
    }
  }

  async testConnection(): Promise<ConnectionTestResult> {
    let url: string;

    try {
      url = new URL(this.config.baseUrl).toString();
    } catch {
      return {
        success: false,
        message: `Invalid base URL: ${this.config.baseUrl}`,
        info: null,
        failure: 'other',
      };
    }

    const outcome = await this.send({
      method: 'GET',
      url,
      headers: new Headers({
        Accept: ACCEPT_HEADER_VALUE,
        'User-Agent': this.settings.userAgent,
      }),
    });

    if (outcome.kind === 'transport_failure') {
      return {
        success: false,
        message: `Connection failed (${outcome.failure}): ${outcome.message}`,
        info: null,
        failure: outcome.failure,
      };
    }

    const info = {
      statusCode: outcome.statusCode,
      responseTimeMs: outcome.elapsedMs,
      headers: outcome.headers,
      url: outcome.url,
    };

    return outcome.statusCode < 400
      ? {
          success: true,
          message: `Connected (status ${outcome.statusCode}, ${outcome.elapsedMs}ms)`,
          info,
          failure: null,
        }
      : {
          success: false,
          message: `Connection failed (status ${outcome.statusCode})`,
          info,
          failure: null,
        };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async send(request: ApiRequest): Promise<RequestOutcome> {
    const startedAt = performance.now();

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        dispatcher: this.dispatcher,
        redirect: this.settings.followRedirects ? 'follow' : 'manual',
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });

      const body = Buffer.from(await response.arrayBuffer());

      return {
        kind: 'response',
        statusCode: response.status,
        headers: Object.fromEntries(response.headers.entries()),
        url: response.url !== '' ? response.url : request.url,
        body,
        elapsedMs: roundMs(performance.now() - startedAt),
      };
    } catch (error) {
      return {
        kind: 'transport_failure',
        failure: classifyTransportError(error),
        message: describeTransportError(error),
        elapsedMs: roundMs(performance.now() - startedAt),
      };
    }
  }

  // Server errors, timeouts and connection errors are retried; client errors
  // and any other transport failure end the call.
  private isRetryable(outcome: RequestOutcome): boolean {
    if (outcome.kind === 'response') {
      return outcome.statusCode >= 500;
    }

    return outcome.failure !== 'other';
  }

  private toFailure(
    outcome: RequestOutcome,
    attempt: number,
  ): ApiConnectorException {
    return outcome.kind === 'response'
      ? this.toHttpFailure(outcome, attempt)
      : this.toTransportFailure(outcome, attempt);
  }

  private toHttpFailure(
    outcome: HttpResponseOutcome,
    attempt: number,
  ): ApiConnectorException {
    const bodyText = outcome.body.toString('utf-8');

    return new ApiConnectorException(
      buildHttpErrorMessage(outcome.statusCode, bodyText),
      outcome.statusCode >= 500
        ? ApiConnectorExceptionCode.HTTP_SERVER_ERROR_EXHAUSTED
        : ApiConnectorExceptionCode.HTTP_CLIENT_ERROR,
      {
        details: {
          statusCode: outcome.statusCode,
          headers: outcome.headers,
          content: bodyText.slice(0, ERROR_BODY_EXCERPT_LENGTH),
          attempts: attempt,
        },
      },
    );
  }

  private toTransportFailure(
    outcome: TransportFailureOutcome,
    attempt: number,
  ): ApiConnectorException {
    switch (outcome.failure) {
      case 'timeout':
        return new ApiConnectorException(
          `Request timed out after ${this.settings.timeoutMs}ms`,
          ApiConnectorExceptionCode.TIMEOUT_EXHAUSTED,
          { details: { attempts: attempt } },
        );
      case 'connection_error':
        return new ApiConnectorException(
          `Connection error: ${outcome.message}`,
          ApiConnectorExceptionCode.CONNECTION_ERROR_EXHAUSTED,
          { details: { attempts: attempt } },
        );
      default:
        return new ApiConnectorException(
          `Request failed: ${outcome.message}`,
          ApiConnectorExceptionCode.REQUEST_FAILED,
          { details: { attempts: attempt } },
        );
    }
  }

  private toParsedResponse(
    outcome: HttpResponseOutcome,
    attempts: number,
  ): ParsedApiResponse {
    const contentType = (outcome.headers['content-type'] ?? '').toLowerCase();
    const decoded = this.responseCodecService.decode(contentType, outcome.body);

    return {
      statusCode: outcome.statusCode,
      headers: outcome.headers,
      url: outcome.url,
      contentType,
      format: decoded.format,
      data: decoded.data,
      parseError: decoded.parseError,
      elapsedMs: outcome.elapsedMs,
      attempts,
    };
  }
}
