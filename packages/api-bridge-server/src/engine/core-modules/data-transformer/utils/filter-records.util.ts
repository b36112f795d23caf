import { assertUnreachable } from 'api-bridge-shared/utils';

import { type FilterCondition } from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import {
  compareStructuredValues,
  stringifyForMatch,
} from 'src/engine/core-modules/data-transformer/utils/compare-structured-values.util';
import { hasField } from 'src/engine/core-modules/data-transformer/utils/map-records.util';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { areStructurallyEqual } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const matchesCondition = (
  fieldValue: StructuredValue,
  { operator, value }: FilterCondition,
): boolean => {
  switch (operator) {
    case 'eq':
      return areStructurallyEqual(fieldValue, value);
    case 'ne':
      return !areStructurallyEqual(fieldValue, value);
    case 'gt':
      return compareStructuredValues(fieldValue, value) > 0;
    case 'gte':
      return compareStructuredValues(fieldValue, value) >= 0;
    case 'lt':
      return compareStructuredValues(fieldValue, value) < 0;
    case 'lte':
      return compareStructuredValues(fieldValue, value) <= 0;
    case 'contains':
      return stringifyForMatch(fieldValue).includes(stringifyForMatch(value));
    case 'startswith':
      return stringifyForMatch(fieldValue).startsWith(stringifyForMatch(value));
    case 'endswith':
      return stringifyForMatch(fieldValue).endsWith(stringifyForMatch(value));
    default:
      return assertUnreachable(operator);
  }
};

// A record is kept when every condition holds. Conditions on a field the
// record does not have are ignored, and items that are not maps are kept.
export const filterRecords = (
  value: StructuredValue,
  conditions: FilterCondition[],
): StructuredValue => {
  if (!isStructuredList(value)) {
    return value;
  }

  return value.filter(
    (item) =>
      !isStructuredMap(item) ||
      conditions.every(
        (condition) =>
          !hasField(item, condition.field) ||
          matchesCondition(item[condition.field], condition),
      ),
  );
};
