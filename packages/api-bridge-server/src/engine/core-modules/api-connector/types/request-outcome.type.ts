import { type TransportFailureKind } from 'src/engine/core-modules/api-connector/types/transport-failure-kind.type';

export type HttpResponseOutcome = {
  kind: 'response';
  statusCode: number;
  headers: Record<string, string>;
  url: string;
  body: Buffer;
  elapsedMs: number;
};

export type TransportFailureOutcome = {
  kind: 'transport_failure';
  failure: TransportFailureKind;
  message: string;
  elapsedMs: number;
};

// Result of a single attempt, consumed by the retry loop.
export type RequestOutcome = HttpResponseOutcome | TransportFailureOutcome;
