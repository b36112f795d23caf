import {
  type StructuredList,
  type StructuredMap,
  type StructuredScalar,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';

export const isStructuredList = (
  value: StructuredValue,
): value is StructuredList => Array.isArray(value);

export const isStructuredMap = (
  value: StructuredValue,
): value is StructuredMap =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isStructuredScalar = (
  value: StructuredValue,
): value is StructuredScalar =>
  value === null || typeof value !== 'object';

export const isListOfMaps = (
  value: StructuredValue,
): value is StructuredMap[] =>
  isStructuredList(value) && value.every(isStructuredMap);
