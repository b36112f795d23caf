import {
  DataTransformerException,
  DataTransformerExceptionCode,
} from 'src/engine/core-modules/data-transformer/data-transformer.exception';
import { getStructuredTypeName } from 'src/engine/core-modules/data-transformer/utils/get-structured-type-name.util';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { canonicalizeStructuredValue } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';

// Orders numbers, strings and booleans against their own kind only.
export const compareStructuredValues = (
  left: StructuredValue,
  right: StructuredValue,
): number => {
  if (typeof left === 'number' && typeof right === 'number') {
    return Math.sign(left - right);
  }

  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }

  if (typeof left === 'boolean' && typeof right === 'boolean') {
    return Number(left) - Number(right);
  }

  throw new DataTransformerException(
    `Cannot compare ${getStructuredTypeName(left)} with ${getStructuredTypeName(right)}`,
    DataTransformerExceptionCode.INCOMPARABLE_VALUES,
  );
};

export const stringifyForMatch = (value: StructuredValue): string => {
  if (typeof value === 'string') {
    return value;
  }

  return value !== null && typeof value === 'object'
    ? canonicalizeStructuredValue(value)
    : String(value);
};
