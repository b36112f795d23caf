import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  CustomException,
  type CustomExceptionOptions,
} from 'src/utils/custom-exception';

export enum DataTransformerExceptionCode {
  INCOMPARABLE_VALUES = 'INCOMPARABLE_VALUES',
  INVALID_TRANSFORM_SPEC = 'INVALID_TRANSFORM_SPEC',
}

const getDataTransformerExceptionUserFriendlyMessage = (
  code: DataTransformerExceptionCode,
) => {
  switch (code) {
    case DataTransformerExceptionCode.INCOMPARABLE_VALUES:
      return 'Values of different types cannot be compared.';
    case DataTransformerExceptionCode.INVALID_TRANSFORM_SPEC:
      return 'The transformation settings are invalid.';
    default:
      return assertUnreachable(code);
  }
};

export class DataTransformerException extends CustomException<DataTransformerExceptionCode> {
  constructor(
    message: string,
    code: DataTransformerExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message, code, {
      userFriendlyMessage:
        userFriendlyMessage ??
        getDataTransformerExceptionUserFriendlyMessage(code),
      details,
    });
  }
}
