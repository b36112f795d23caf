import { type TransportFailureKind } from 'src/engine/core-modules/api-connector/types/transport-failure-kind.type';

export type ConnectionInfo = {
  statusCode: number;
  responseTimeMs: number;
  headers: Record<string, string>;
  url: string;
};

export type ConnectionTestResult = {
  success: boolean;
  message: string;
  info: ConnectionInfo | null;
  failure: TransportFailureKind | null;
};
