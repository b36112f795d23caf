import { isDefined } from 'api-bridge-shared/utils';

import {
  type SkippedTransformStep,
  type TransformReport,
  type TransformStepName,
} from 'src/engine/core-modules/data-transformer/types/transform-report.type';
import { type TransformSpec } from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import { convertFieldTypes } from 'src/engine/core-modules/data-transformer/utils/convert-value-type.util';
import { addComputedFields } from 'src/engine/core-modules/data-transformer/utils/evaluate-computed-expression.util';
import { filterRecords } from 'src/engine/core-modules/data-transformer/utils/filter-records.util';
import {
  renameFields,
  selectFields,
} from 'src/engine/core-modules/data-transformer/utils/select-fields.util';
import {
  limitRecords,
  sortRecords,
} from 'src/engine/core-modules/data-transformer/utils/sort-records.util';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { getErrorMessage } from 'src/utils/get-error-message.util';

type TransformStep = {
  name: TransformStepName;
  run: ((value: StructuredValue) => StructuredValue) | null;
};

const getTransformSteps = (spec: TransformSpec): TransformStep[] => {
  const {
    selectFields: fields,
    renameFields: renames,
    filterConditions,
    sortBy,
    sortDesc,
    limit,
    typeConversions,
    computedFields,
  } = spec;

  return [
    {
      name: 'select_fields',
      run: isDefined(fields) ? (value) => selectFields(value, fields) : null,
    },
    {
      name: 'rename_fields',
      run: isDefined(renames) ? (value) => renameFields(value, renames) : null,
    },
    {
      name: 'filter_conditions',
      run: isDefined(filterConditions)
        ? (value) => filterRecords(value, filterConditions)
        : null,
    },
    {
      name: 'sort_by',
      run: isDefined(sortBy)
        ? (value) => sortRecords(value, sortBy, sortDesc ?? false)
        : null,
    },
    {
      name: 'limit',
      run: isDefined(limit) ? (value) => limitRecords(value, limit) : null,
    },
    {
      name: 'type_conversions',
      run: isDefined(typeConversions)
        ? (value) => convertFieldTypes(value, typeConversions)
        : null,
    },
    {
      name: 'computed_fields',
      run: isDefined(computedFields)
        ? (value) => addComputedFields(value, computedFields)
        : null,
    },
  ];
};

// A step that throws is skipped: the value from the previous step carries on
// and the failure is reported instead of raised.
export const applyTransformSpec = (
  value: StructuredValue,
  spec: TransformSpec,
): TransformReport => {
  const skippedSteps: SkippedTransformStep[] = [];
  let current = value;

  for (const { name, run } of getTransformSteps(spec)) {
    if (run === null) {
      continue;
    }

    try {
      current = run(current);
    } catch (error) {
      skippedSteps.push({
        step: name,
        message: getErrorMessage(error),
      });
    }
  }

  return { value: current, skippedSteps };
};
