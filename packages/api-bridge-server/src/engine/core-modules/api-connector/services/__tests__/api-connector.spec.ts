import { MockAgent } from 'undici';

import { DEFAULT_API_CONNECTOR_SETTINGS } from 'src/engine/core-modules/api-config/api-config.constants';
import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';
import { ApiConnectorExceptionCode } from 'src/engine/core-modules/api-connector/api-connector.exception';
import { ApiConnector } from 'src/engine/core-modules/api-connector/services/api-connector';
import { type ApiCallResult } from 'src/engine/core-modules/api-connector/types/api-call-result.type';
import { ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';

const ORIGIN = 'https://weather.test';

const config: ApiConfig = {
  name: 'weather',
  baseUrl: `${ORIGIN}/v1/`,
  description: 'Forecast service',
  enabled: true,
  auth: { type: 'bearer', token: 'test-secret' },
  endpoints: {
    forecast: {
      name: 'forecast',
      method: 'GET',
      path: 'forecast',
      headers: {},
      description: 'Daily forecast',
      parameters: { city: { type: 'string' } },
      responseFormat: 'json',
    },
  },
};

const JSON_HEADERS = { headers: { 'content-type': 'application/json' } };

const withCode = (message: string, code: string) =>
  Object.assign(new Error(message), { code });

const getErrorCode = (result: ApiCallResult) =>
  result.success ? null : result.error.code;

describe('ApiConnector', () => {
  let mockAgent: MockAgent;
  let connector: ApiConnector;

  const interceptForecast = () =>
    mockAgent
      .get(ORIGIN)
      .intercept({
        path: '/v1/forecast',
        method: 'GET',
        query: { city: 'Paris' },
      });

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();

    connector = new ApiConnector(
      config,
      { ...DEFAULT_API_CONNECTOR_SETTINGS, maxRetries: 3, retryDelayMs: 0 },
      new ResponseCodecService(),
      { dispatcher: mockAgent },
    );
  });

  afterEach(async () => {
    await connector.close();
    await mockAgent.close();
  });

  describe('call', () => {
    it('should decode a json response', async () => {
      interceptForecast().reply(200, { temperature: 21 }, JSON_HEADERS);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(result.success).toBe(true);
      expect(result.success && result.response).toMatchObject({
        statusCode: 200,
        contentType: 'application/json',
        format: 'json',
        data: { temperature: 21 },
        parseError: null,
        attempts: 1,
      });
    });

    it('should decode an xml response', async () => {
      interceptForecast().reply(
        200,
        '<forecast><day>mon</day><day>tue</day></forecast>',
        { headers: { 'content-type': 'application/xml; charset=utf-8' } },
      );

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(result.success && result.response.data).toEqual({
        forecast: { day: ['mon', 'tue'] },
      });
    });

    it('should return text with a parse error when json does not parse', async () => {
      interceptForecast().reply(200, 'not json', JSON_HEADERS);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(result.success).toBe(true);
      expect(result.success && result.response.format).toBe('text');
      expect(result.success && result.response.data).toBe('not json');
      expect(result.success && result.response.parseError).toMatch(
        /^JSON parse failed: /,
      );
    });

    it('should succeed when the last allowed attempt succeeds', async () => {
      interceptForecast()
        .reply(503, { message: 'busy' }, JSON_HEADERS)
        .times(3);
      interceptForecast().reply(200, { temperature: 21 }, JSON_HEADERS);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(result.success).toBe(true);
      expect(result.success && result.response.attempts).toBe(4);
    });

    it('should report server errors once every attempt failed', async () => {
      interceptForecast()
        .reply(503, { message: 'busy' }, JSON_HEADERS)
        .times(4);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(getErrorCode(result)).toBe(
        ApiConnectorExceptionCode.HTTP_SERVER_ERROR_EXHAUSTED,
      );
      expect(!result.success && result.error.message).toBe('HTTP 503: busy');
      expect(!result.success && result.error.details).toMatchObject({
        statusCode: 503,
        content: '{"message":"busy"}',
        attempts: 4,
      });
    });

    it('should not retry client errors', async () => {
      interceptForecast().reply(404, { message: 'Unknown city' }, JSON_HEADERS);
      interceptForecast().reply(200, { temperature: 21 }, JSON_HEADERS);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(getErrorCode(result)).toBe(
        ApiConnectorExceptionCode.HTTP_CLIENT_ERROR,
      );
      expect(!result.success && result.error.message).toBe(
        'HTTP 404: Unknown city',
      );
    });

    it('should retry connection errors until exhausted', async () => {
      interceptForecast()
        .replyWithError(withCode('connect ECONNREFUSED', 'ECONNREFUSED'))
        .times(4);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(getErrorCode(result)).toBe(
        ApiConnectorExceptionCode.CONNECTION_ERROR_EXHAUSTED,
      );
    });

    it('should retry timeouts until exhausted', async () => {
      interceptForecast()
        .replyWithError(
          withCode('Headers Timeout Error', 'UND_ERR_HEADERS_TIMEOUT'),
        )
        .times(4);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(getErrorCode(result)).toBe(
        ApiConnectorExceptionCode.TIMEOUT_EXHAUSTED,
      );
    });

    it('should recover from a timeout on a later attempt', async () => {
      interceptForecast().replyWithError(
        withCode('Headers Timeout Error', 'UND_ERR_HEADERS_TIMEOUT'),
      );
      interceptForecast().reply(200, { temperature: 21 }, JSON_HEADERS);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(result.success && result.response.attempts).toBe(2);
    });

    it('should stop at once on other transport failures', async () => {
      interceptForecast().replyWithError(new Error('Invalid header value'));
      interceptForecast().reply(200, { temperature: 21 }, JSON_HEADERS);

      const result = await connector.call('forecast', { city: 'Paris' });

      expect(getErrorCode(result)).toBe(
        ApiConnectorExceptionCode.REQUEST_FAILED,
      );
    });

    it('should report unknown endpoints', async () => {
      const result = await connector.call('history');

      expect(getErrorCode(result)).toBe(
        ApiConnectorExceptionCode.ENDPOINT_NOT_FOUND,
      );
    });
  });

  describe('testConnection', () => {
    it('should report status of the base url', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/v1/', method: 'GET' })
        .reply(200, 'ok');

      const result = await connector.testConnection();

      expect(result.success).toBe(true);
      expect(result.failure).toBeNull();
      expect(result.info?.statusCode).toBe(200);
    });

    it('should report the transport failure kind', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/v1/', method: 'GET' })
        .replyWithError(withCode('getaddrinfo ENOTFOUND', 'ENOTFOUND'));

      const result = await connector.testConnection();

      expect(result.success).toBe(false);
      expect(result.failure).toBe('connection_error');
      expect(result.info).toBeNull();
    });
  });

  describe('getEndpoints', () => {
    it('should describe configured endpoints', () => {
      expect(connector.getEndpoints()).toEqual([
        {
          name: 'forecast',
          method: 'GET',
          path: 'forecast',
          description: 'Daily forecast',
          parameters: { city: { type: 'string' } },
          responseFormat: 'json',
        },
      ]);
    });
  });
});
