import { mapRecords } from 'src/engine/core-modules/data-transformer/utils/map-records.util';
import { parseNumericText } from 'src/engine/core-modules/data-transformer/utils/parse-numeric-text.util';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { canonicalizeStructuredValue } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';
import { isStructuredScalar } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const FIELD_REFERENCE_PATTERN = /^\$\{([^}]+)\}$/;

const QUOTES_PATTERN = /^["']+|["']+$/g;

const getFieldReference = (operand: string): string | null =>
  FIELD_REFERENCE_PATTERN.exec(operand)?.[1] ?? null;

const toOperandNumber = (value: StructuredValue): number | null => {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  return typeof value === 'string' ? parseNumericText(value) : null;
};

const toOperandText = (value: StructuredValue): string => {
  if (value === null) {
    return '';
  }

  return isStructuredScalar(value)
    ? String(value)
    : canonicalizeStructuredValue(value);
};

const sumOperands = (
  record: StructuredMap,
  expression: string,
): StructuredValue => {
  let total = 0;

  for (const operand of expression.split('+').map((part) => part.trim())) {
    const field = getFieldReference(operand);
    const operandValue =
      field === null
        ? parseNumericText(operand)
        : toOperandNumber(Object.hasOwn(record, field) ? record[field] : 0);

    if (operandValue === null) {
      return expression;
    }

    total += operandValue;
  }

  return total;
};

const concatenateOperands = (
  record: StructuredMap,
  expression: string,
): string =>
  expression
    .split('||')
    .map((part) => part.trim())
    .map((operand) => {
      const field = getFieldReference(operand);

      if (field === null) {
        return operand.replace(QUOTES_PATTERN, '');
      }

      return Object.hasOwn(record, field) ? toOperandText(record[field]) : '';
    })
    .join('');

export const evaluateComputedExpression = (
  record: StructuredMap,
  expression: string,
): StructuredValue => {
  const field = getFieldReference(expression.trim());

  if (field !== null) {
    return Object.hasOwn(record, field) ? record[field] : null;
  }

  if (expression.includes('+')) {
    return sumOperands(record, expression);
  }

  if (expression.includes('||')) {
    return concatenateOperands(record, expression);
  }

  return expression;
};

// Fields are computed in declaration order, so later expressions can refer
// to earlier computed fields.
export const addComputedFields = (
  value: StructuredValue,
  computedFields: Record<string, string>,
): StructuredValue =>
  mapRecords(value, (record) =>
    Object.entries(computedFields).reduce<StructuredMap>(
      (computed, [name, expression]) => ({
        ...computed,
        [name]: evaluateComputedExpression(computed, expression),
      }),
      { ...record },
    ),
  );
