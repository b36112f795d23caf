import { createHash } from 'crypto';

import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { canonicalizeStructuredValue } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';

export const computeContentHash = (value: StructuredValue): string =>
  createHash('sha256')
    .update(canonicalizeStructuredValue(value), 'utf8')
    .digest('hex');
