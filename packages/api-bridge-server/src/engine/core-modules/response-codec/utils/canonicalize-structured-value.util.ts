import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

// Compact JSON with map keys sorted at every depth, so values that differ only
// in key order render identically.
export const canonicalizeStructuredValue = (value: StructuredValue): string => {
  if (isStructuredList(value)) {
    return `[${value.map(canonicalizeStructuredValue).join(',')}]`;
  }

  if (isStructuredMap(value)) {
    const entries = Object.keys(value)
      .sort()
      .map(
        (key) =>
          `${JSON.stringify(key)}:${canonicalizeStructuredValue(value[key])}`,
      );

    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value);
};

export const areStructurallyEqual = (
  left: StructuredValue,
  right: StructuredValue,
): boolean =>
  canonicalizeStructuredValue(left) === canonicalizeStructuredValue(right);
