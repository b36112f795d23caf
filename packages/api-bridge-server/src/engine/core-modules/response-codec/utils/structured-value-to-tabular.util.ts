import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isListOfMaps,
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

export const structuredValueToTabular = (
  value: StructuredValue,
): StructuredMap[] => {
  if (isListOfMaps(value)) {
    return value;
  }

  if (isStructuredList(value)) {
    return value.map((item, index) => ({ value: item, index }));
  }

  if (isStructuredMap(value)) {
    return [value];
  }

  return [{ value }];
};

export const structuredValueToList = (
  value: StructuredValue,
): StructuredValue[] => (isStructuredList(value) ? value : [value]);
