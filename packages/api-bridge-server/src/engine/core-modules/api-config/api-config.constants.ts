import { type ApiConnectorSettings } from 'src/engine/core-modules/api-config/types/api-connector-settings.type';

export const DEFAULT_API_KEY_HEADER_NAME = 'X-API-Key';

export const DEFAULT_ENDPOINT_METHOD = 'GET';

export const DEFAULT_RESPONSE_FORMAT = 'json';

export const DEFAULT_API_CONNECTOR_SETTINGS: ApiConnectorSettings = {
  timeoutMs: 30000,
  maxRetries: 3,
  retryDelayMs: 1000,
  userAgent: 'api-bridge/1.0',
  verifySsl: true,
  followRedirects: true,
};
