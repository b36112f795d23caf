import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export const FILTER_OPERATORS = [
  'eq',
  'ne',
  'gt',
  'gte',
  'lt',
  'lte',
  'contains',
  'startswith',
  'endswith',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type FilterCondition = {
  field: string;
  operator: FilterOperator;
  value: StructuredValue;
};

export const CONVERSION_TYPES = [
  'int',
  'float',
  'str',
  'bool',
  'datetime',
] as const;

export type ConversionType = (typeof CONVERSION_TYPES)[number];

// Steps run in a fixed order: select, rename, filter, sort, limit,
// typeConversions, computedFields.
export type TransformSpec = {
  selectFields?: string[];
  renameFields?: Record<string, string>;
  filterConditions?: FilterCondition[];
  sortBy?: string;
  sortDesc?: boolean;
  limit?: number;
  typeConversions?: Record<string, ConversionType>;
  computedFields?: Record<string, string>;
};
