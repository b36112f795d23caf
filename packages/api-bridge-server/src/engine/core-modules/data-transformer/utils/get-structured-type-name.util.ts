import { type StructuredTypeName } from 'src/engine/core-modules/data-transformer/types/data-preview.type';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export const getStructuredTypeName = (
  value: StructuredValue,
): StructuredTypeName => {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'list';
  }

  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'map';
  }
};
