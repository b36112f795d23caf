import { Headers } from 'undici';

import {
  type ApiConfig,
  type EndpointConfig,
} from 'src/engine/core-modules/api-config/types/api-config.type';
import { type ApiRequest } from 'src/engine/core-modules/api-connector/types/api-request.type';
import { buildAuthHeaders } from 'src/engine/core-modules/api-connector/utils/build-auth-headers.util';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredList } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

export const ACCEPT_HEADER_VALUE =
  'application/json, application/xml, text/plain, */*';

const QUERY_METHODS = ['GET', 'DELETE'];

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

const toParamString = (value: StructuredValue): string =>
  typeof value === 'object' && value !== null
    ? JSON.stringify(value)
    : String(value);

// Null values are dropped and list values repeat the key.
const toParamEntries = (params: StructuredMap): [string, string][] =>
  Object.entries(params).flatMap(([key, value]): [string, string][] => {
    if (value === null) {
      return [];
    }

    if (isStructuredList(value)) {
      return value
        .filter((item) => item !== null)
        .map((item): [string, string] => [key, toParamString(item)]);
    }

    return [[key, toParamString(value)]];
  });

export const buildApiRequest = (
  config: ApiConfig,
  endpoint: EndpointConfig,
  params: StructuredMap,
  userAgent: string,
): ApiRequest => {
  const method = endpoint.method.toUpperCase();
  const url = new URL(endpoint.path, config.baseUrl);

  const headers = new Headers({
    Accept: ACCEPT_HEADER_VALUE,
    'User-Agent': userAgent,
  });

  // Endpoint headers win over auth headers.
  for (const [name, value] of Object.entries({
    ...buildAuthHeaders(config.auth),
    ...endpoint.headers,
  })) {
    headers.set(name, value);
  }

  const paramEntries = toParamEntries(params);

  if (QUERY_METHODS.includes(method)) {
    for (const [key, value] of paramEntries) {
      url.searchParams.append(key, value);
    }

    return { method, url: url.toString(), headers };
  }

  if (Object.keys(params).length === 0) {
    return { method, url: url.toString(), headers };
  }

  const contentType = headers.get('content-type') ?? '';

  if (contentType.toLowerCase().includes(FORM_CONTENT_TYPE)) {
    return {
      method,
      url: url.toString(),
      headers,
      body: new URLSearchParams(paramEntries),
    };
  }

  if (contentType === '') {
    headers.set('Content-Type', 'application/json');
  }

  return {
    method,
    url: url.toString(),
    headers,
    body: JSON.stringify(params),
  };
};
