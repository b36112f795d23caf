import { type ResponseCodecException } from 'src/engine/core-modules/response-codec/response-codec.exception';
import { type OutputFormat } from 'src/engine/core-modules/response-codec/types/output-format.type';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type EncodedOutput = string | StructuredValue[];

export type EncodeResult =
  | { success: true; format: OutputFormat; output: EncodedOutput }
  | { success: false; error: ResponseCodecException };
