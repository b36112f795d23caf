import {
  buildMessage,
  ValidateBy,
  type ValidationOptions,
} from 'class-validator';
import { isPlainObject } from 'api-bridge-shared/utils';

export const isStringRecord = (
  value: unknown,
  allowedValues?: readonly string[],
): value is Record<string, string> =>
  isPlainObject(value) &&
  Object.values(value).every(
    (entry) =>
      typeof entry === 'string' &&
      (allowedValues === undefined || allowedValues.includes(entry)),
  );

// Object whose values are all strings, optionally restricted to a fixed set.
export const IsStringRecord = (
  allowedValues?: readonly string[],
  validationOptions?: ValidationOptions,
) =>
  ValidateBy(
    {
      name: 'isStringRecord',
      constraints: [allowedValues],
      validator: {
        validate: (value: unknown) => isStringRecord(value, allowedValues),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            allowedValues === undefined
              ? `${eachPrefix}$property must be an object of string values`
              : `${eachPrefix}$property values must be one of: ${allowedValues.join(', ')}`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
