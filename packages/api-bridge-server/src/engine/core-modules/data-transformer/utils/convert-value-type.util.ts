import { assertUnreachable } from 'api-bridge-shared/utils';
import { format, isValid, parse } from 'date-fns';

import { type ConversionType } from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import { mapRecords } from 'src/engine/core-modules/data-transformer/utils/map-records.util';
import { parseNumericText } from 'src/engine/core-modules/data-transformer/utils/parse-numeric-text.util';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { canonicalizeStructuredValue } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';
import { isStructuredScalar } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

export const DATETIME_INPUT_FORMATS = [
  'yyyy-MM-dd',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy/MM/dd',
  'dd/MM/yyyy',
];

export const DATETIME_OUTPUT_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

const TRUTHY_STRINGS = ['true', '1', 'yes', 'on'];

const toNumber = (value: StructuredValue): number | null => {
  switch (typeof value) {
    case 'number':
      return value;
    case 'boolean':
      return value ? 1 : 0;
    case 'string':
      return parseNumericText(value);
    default:
      return null;
  }
};

const toBoolean = (value: StructuredValue): boolean | null => {
  if (value === null) {
    return null;
  }

  switch (typeof value) {
    case 'string':
      return TRUTHY_STRINGS.includes(value.toLowerCase());
    case 'number':
      return value !== 0;
    case 'boolean':
      return value;
    default:
      return Array.isArray(value)
        ? value.length > 0
        : Object.keys(value).length > 0;
  }
};

const toDatetime = (value: StructuredValue): StructuredValue => {
  if (typeof value !== 'string') {
    return value;
  }

  const referenceDate = new Date(0);

  for (const inputFormat of DATETIME_INPUT_FORMATS) {
    const parsed = parse(value, inputFormat, referenceDate);

    if (isValid(parsed)) {
      return format(parsed, DATETIME_OUTPUT_FORMAT);
    }
  }

  return value;
};

// Returns the original value whenever the conversion does not apply.
export const convertValueType = (
  value: StructuredValue,
  targetType: ConversionType,
): StructuredValue => {
  switch (targetType) {
    case 'int': {
      const converted = toNumber(value);

      return converted === null ? value : Math.trunc(converted);
    }
    case 'float':
      return toNumber(value) ?? value;
    case 'str':
      if (value === null) {
        return null;
      }

      return isStructuredScalar(value)
        ? String(value)
        : canonicalizeStructuredValue(value);
    case 'bool':
      return toBoolean(value);
    case 'datetime':
      return toDatetime(value);
    default:
      return assertUnreachable(targetType);
  }
};

export const convertFieldTypes = (
  value: StructuredValue,
  conversions: Record<string, ConversionType>,
): StructuredValue =>
  mapRecords(value, (record) =>
    Object.fromEntries(
      Object.entries(record).map(([key, entry]) => [
        key,
        Object.hasOwn(conversions, key)
          ? convertValueType(entry, conversions[key])
          : entry,
      ]),
    ),
  );
