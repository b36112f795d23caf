import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  CustomException,
  type CustomExceptionOptions,
} from 'src/utils/custom-exception';

export enum ApiConfigExceptionCode {
  API_NOT_FOUND = 'API_NOT_FOUND',
  API_DISABLED = 'API_DISABLED',
  INVALID_API_CONFIG = 'INVALID_API_CONFIG',
}

const getApiConfigExceptionUserFriendlyMessage = (
  code: ApiConfigExceptionCode,
) => {
  switch (code) {
    case ApiConfigExceptionCode.API_NOT_FOUND:
      return 'No API is configured under this name.';
    case ApiConfigExceptionCode.API_DISABLED:
      return 'This API is disabled in the configuration.';
    case ApiConfigExceptionCode.INVALID_API_CONFIG:
      return 'The API configuration file is invalid.';
    default:
      return assertUnreachable(code);
  }
};

export class ApiConfigException extends CustomException<ApiConfigExceptionCode> {
  constructor(
    message: string,
    code: ApiConfigExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message, code, {
      userFriendlyMessage:
        userFriendlyMessage ?? getApiConfigExceptionUserFriendlyMessage(code),
      details,
    });
  }
}
