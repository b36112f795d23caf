import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type TransformStepName =
  | 'select_fields'
  | 'rename_fields'
  | 'filter_conditions'
  | 'sort_by'
  | 'limit'
  | 'type_conversions'
  | 'computed_fields';

export type SkippedTransformStep = {
  step: TransformStepName;
  message: string;
};

export type TransformReport = {
  value: StructuredValue;
  skippedSteps: SkippedTransformStep[];
};
