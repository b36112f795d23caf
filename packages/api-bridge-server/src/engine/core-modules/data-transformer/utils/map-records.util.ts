import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

// Applies a record-level change to a map, or to every map inside a list.
// Anything else passes through.
export const mapRecords = (
  value: StructuredValue,
  transformRecord: (record: StructuredMap) => StructuredMap,
): StructuredValue => {
  if (isStructuredMap(value)) {
    return transformRecord(value);
  }

  if (isStructuredList(value)) {
    return value.map((item) =>
      isStructuredMap(item) ? transformRecord(item) : item,
    );
  }

  return value;
};

export const hasField = (record: StructuredMap, field: string): boolean =>
  Object.hasOwn(record, field);
