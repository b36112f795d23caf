import { isPlainObject } from 'api-bridge-shared/utils';

import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

// Narrows an arbitrary value (typically JSON.parse output) into a
// StructuredValue, following JSON.stringify rules for values JSON cannot hold.
export const toStructuredValue = (value: unknown): StructuredValue => {
  if (value === null || value === undefined) {
    return null;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    default:
      return null;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (Array.isArray(value)) {
    return value.map((item) => toStructuredValue(item));
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .map(([key, entry]) => [key, toStructuredValue(entry)]),
    );
  }

  return String(value);
};

export const parseStructuredJson = (text: string): StructuredValue =>
  toStructuredValue(JSON.parse(text));
