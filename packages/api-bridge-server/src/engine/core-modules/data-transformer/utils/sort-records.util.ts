import { compareStructuredValues } from 'src/engine/core-modules/data-transformer/utils/compare-structured-values.util';
import { hasField } from 'src/engine/core-modules/data-transformer/utils/map-records.util';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const MISSING_SORT_KEY = 0;

const getSortKey = (item: StructuredValue, field: string): StructuredValue => {
  if (!isStructuredMap(item)) {
    return item;
  }

  return hasField(item, field) ? item[field] : MISSING_SORT_KEY;
};

// Stable in both directions: equal keys keep their original order.
export const sortRecords = (
  value: StructuredValue,
  field: string,
  descending: boolean,
): StructuredValue => {
  if (!isStructuredList(value)) {
    return value;
  }

  return value
    .map((item) => ({ item, key: getSortKey(item, field) }))
    .sort((left, right) =>
      descending
        ? compareStructuredValues(right.key, left.key)
        : compareStructuredValues(left.key, right.key),
    )
    .map(({ item }) => item);
};

export const limitRecords = (
  value: StructuredValue,
  limit: number,
): StructuredValue =>
  isStructuredList(value) ? value.slice(0, Math.max(0, limit)) : value;
