import { type ApiConnectorException } from 'src/engine/core-modules/api-connector/api-connector.exception';
import { type ResponseBodyFormat } from 'src/engine/core-modules/response-codec/types/decoded-body.type';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type ParsedApiResponse = {
  statusCode: number;
  headers: Record<string, string>;
  url: string;
  contentType: string;
  format: ResponseBodyFormat;
  data: StructuredValue;
  parseError: string | null;
  elapsedMs: number;
  attempts: number;
};

export type ApiCallResult =
  | { success: true; response: ParsedApiResponse }
  | { success: false; error: ApiConnectorException };
