import { Injectable } from '@nestjs/common';

import { type DecodedBody } from 'src/engine/core-modules/response-codec/types/decoded-body.type';
import { type EncodeResult } from 'src/engine/core-modules/response-codec/types/encode-result.type';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { canonicalizeStructuredValue } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';
import { decodeResponseBody } from 'src/engine/core-modules/response-codec/utils/decode-response-body.util';
import { encodeStructuredValue } from 'src/engine/core-modules/response-codec/utils/encode-structured-value.util';
import { toStructuredValue } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';

@Injectable()
export class ResponseCodecService {
  decode(contentType: string, body: Buffer | string): DecodedBody {
    return decodeResponseBody(contentType, body);
  }

  encode(value: StructuredValue, format: string): EncodeResult {
    return encodeStructuredValue(value, format);
  }

  toStructuredValue(value: unknown): StructuredValue {
    return toStructuredValue(value);
  }

  canonicalize(value: StructuredValue): string {
    return canonicalizeStructuredValue(value);
  }
}
