import { isDefined } from 'api-bridge-shared/utils';

import {
  CommandException,
  CommandExceptionCode,
} from 'src/command/command.exception';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredMap } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';
import { toStructuredValue } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';
import { getErrorMessage } from 'src/utils/get-error-message.util';

export const getRequiredArgument = (
  passedParams: string[],
  index: number,
  name: string,
): string => {
  const value = passedParams[index]?.trim();

  if (!isDefined(value) || value === '') {
    throw new CommandException(
      `Missing argument: ${name}`,
      CommandExceptionCode.MISSING_ARGUMENT,
    );
  }

  return value;
};

export const parseJsonObjectOption = (
  optionName: string,
  text: string,
): StructuredMap => {
  let parsed: unknown;

  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new CommandException(
      `Option --${optionName} is not valid JSON: ${getErrorMessage(error)}`,
      CommandExceptionCode.INVALID_OPTION,
    );
  }

  const value = toStructuredValue(parsed);

  if (!isStructuredMap(value)) {
    throw new CommandException(
      `Option --${optionName} must be a JSON object`,
      CommandExceptionCode.INVALID_OPTION,
    );
  }

  return value;
};

// Option parsers keep NaN so the command can report the bad value itself.
export const parseNumberOption = (text: string): number =>
  text.trim() === '' ? Number.NaN : Number(text);

export const assertNonNegativeInteger = (
  optionName: string,
  value: number | undefined,
): number | undefined => {
  if (isDefined(value) && !(Number.isInteger(value) && value >= 0)) {
    throw new CommandException(
      `Option --${optionName} must be a non-negative integer`,
      CommandExceptionCode.INVALID_OPTION,
    );
  }

  return value;
};

export const parseListOption = (text: string): string[] =>
  text
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
