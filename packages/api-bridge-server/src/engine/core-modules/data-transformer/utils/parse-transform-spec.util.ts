import { plainToInstance } from 'class-transformer';
import { type ValidationError, validateSync } from 'class-validator';
import { isPlainObject } from 'api-bridge-shared/utils';

import {
  DataTransformerException,
  DataTransformerExceptionCode,
} from 'src/engine/core-modules/data-transformer/data-transformer.exception';
import { TransformSpecInput } from 'src/engine/core-modules/data-transformer/dtos/transform-spec.input';
import { type TransformSpec } from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import { toStructuredValue } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';

const DEFAULT_FILTER_OPERATOR = 'eq';

const flattenValidationErrors = (
  errors: ValidationError[],
  parentPath = '',
): string[] =>
  errors.flatMap((error) => {
    const path =
      parentPath === '' ? error.property : `${parentPath}.${error.property}`;

    return [
      ...Object.values(error.constraints ?? {}).map(
        (constraint) => `${path}: ${constraint}`,
      ),
      ...flattenValidationErrors(error.children ?? [], path),
    ];
  });

// Maps the snake_case external form onto a TransformSpec.
export const parseTransformSpec = (input: unknown): TransformSpec => {
  if (!isPlainObject(input)) {
    throw new DataTransformerException(
      'Transform spec must be an object',
      DataTransformerExceptionCode.INVALID_TRANSFORM_SPEC,
    );
  }

  const spec = plainToInstance(TransformSpecInput, input);
  const errors = flattenValidationErrors(validateSync(spec));

  if (errors.length > 0) {
    throw new DataTransformerException(
      `Invalid transform spec: ${errors.join('; ')}`,
      DataTransformerExceptionCode.INVALID_TRANSFORM_SPEC,
      { details: { errors } },
    );
  }

  return {
    selectFields: spec.select_fields,
    renameFields: spec.rename_fields,
    filterConditions: spec.filter_conditions?.map((condition) => ({
      field: condition.field,
      operator: condition.operator ?? DEFAULT_FILTER_OPERATOR,
      value: toStructuredValue(condition.value),
    })),
    sortBy: spec.sort_by,
    sortDesc: spec.sort_desc,
    limit: spec.limit,
    typeConversions: spec.type_conversions,
    computedFields: spec.computed_fields,
  };
};
