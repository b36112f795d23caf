import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type ResponseBodyFormat = 'json' | 'xml' | 'text';

export type DecodedBody = {
  format: ResponseBodyFormat;
  data: StructuredValue;
  // Set when the body claimed JSON or XML but could not be parsed; data then
  // holds the raw text.
  parseError: string | null;
};
