import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const ENVIRONMENT_REFERENCE_PATTERN = /\$\{([^}]+)\}/g;

// Replaces every ${NAME} inside string values; unset variables become ''.
export const substituteEnvironmentVariables = (
  value: StructuredValue,
  environment: Record<string, string | undefined>,
): StructuredValue => {
  if (typeof value === 'string') {
    return value.replace(
      ENVIRONMENT_REFERENCE_PATTERN,
      (_reference, name: string) => environment[name] ?? '',
    );
  }

  if (isStructuredList(value)) {
    return value.map((item) => substituteEnvironmentVariables(item, environment));
  }

  if (isStructuredMap(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [
        key,
        substituteEnvironmentVariables(entry, environment),
      ]),
    );
  }

  return value;
};
