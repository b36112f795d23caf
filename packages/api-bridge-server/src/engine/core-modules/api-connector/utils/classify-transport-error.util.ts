import { isDefined } from 'api-bridge-shared/utils';

import { type TransportFailureKind } from 'src/engine/core-modules/api-connector/types/transport-failure-kind.type';

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const getErrorCode = (error: Error): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined;

// undici's fetch rejects with TypeError('fetch failed') and keeps the socket
// error as its cause; happy-eyeballs failures arrive as an AggregateError.
const collectErrorChain = (error: unknown): Error[] => {
  if (!(error instanceof Error)) {
    return [];
  }

  const nested =
    error instanceof AggregateError
      ? error.errors.flatMap((item: unknown) => collectErrorChain(item))
      : [];

  return [error, ...nested, ...collectErrorChain(error.cause)];
};

export const classifyTransportError = (
  error: unknown,
): TransportFailureKind => {
  const chain = collectErrorChain(error);

  if (chain.some((item) => item.name === 'TimeoutError')) {
    return 'timeout';
  }

  const codes = chain.map(getErrorCode);

  if (codes.some((code) => isDefined(code) && TIMEOUT_ERROR_CODES.has(code))) {
    return 'timeout';
  }

  if (
    codes.some((code) => isDefined(code) && CONNECTION_ERROR_CODES.has(code))
  ) {
    return 'connection_error';
  }

  return 'other';
};

export const describeTransportError = (error: unknown): string => {
  const chain = collectErrorChain(error);

  if (chain.length === 0) {
    return String(error);
  }

  return chain.map((item) => item.message).filter(Boolean).join(': ');
};
