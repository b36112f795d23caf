import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  CustomException,
  type CustomExceptionOptions,
} from 'src/utils/custom-exception';

export enum ApiDataStorageExceptionCode {
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_CREATE_ERROR = 'SESSION_CREATE_ERROR',
  STORAGE_WRITE_ERROR = 'STORAGE_WRITE_ERROR',
}

const getApiDataStorageExceptionUserFriendlyMessage = (
  code: ApiDataStorageExceptionCode,
) => {
  switch (code) {
    case ApiDataStorageExceptionCode.SESSION_NOT_FOUND:
      return 'Storage session not found.';
    case ApiDataStorageExceptionCode.SESSION_CREATE_ERROR:
      return 'The storage session could not be created.';
    case ApiDataStorageExceptionCode.STORAGE_WRITE_ERROR:
      return 'The data could not be stored.';
    default:
      return assertUnreachable(code);
  }
};

export class ApiDataStorageException extends CustomException<ApiDataStorageExceptionCode> {
  constructor(
    message: string,
    code: ApiDataStorageExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message, code, {
      userFriendlyMessage:
        userFriendlyMessage ??
        getApiDataStorageExceptionUserFriendlyMessage(code),
      details,
    });
  }
}
