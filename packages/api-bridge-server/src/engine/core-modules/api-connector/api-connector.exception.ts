import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  CustomException,
  type CustomExceptionOptions,
} from 'src/utils/custom-exception';

export enum ApiConnectorExceptionCode {
  ENDPOINT_NOT_FOUND = 'ENDPOINT_NOT_FOUND',
  HTTP_CLIENT_ERROR = 'HTTP_CLIENT_ERROR',
  HTTP_SERVER_ERROR_EXHAUSTED = 'HTTP_SERVER_ERROR_EXHAUSTED',
  TIMEOUT_EXHAUSTED = 'TIMEOUT_EXHAUSTED',
  CONNECTION_ERROR_EXHAUSTED = 'CONNECTION_ERROR_EXHAUSTED',
  REQUEST_FAILED = 'REQUEST_FAILED',
}

const getApiConnectorExceptionUserFriendlyMessage = (
  code: ApiConnectorExceptionCode,
) => {
  switch (code) {
    case ApiConnectorExceptionCode.ENDPOINT_NOT_FOUND:
      return 'This endpoint is not configured for the API.';
    case ApiConnectorExceptionCode.HTTP_CLIENT_ERROR:
      return 'The API rejected the request.';
    case ApiConnectorExceptionCode.HTTP_SERVER_ERROR_EXHAUSTED:
      return 'The API kept failing with a server error.';
    case ApiConnectorExceptionCode.TIMEOUT_EXHAUSTED:
      return 'The API did not answer in time.';
    case ApiConnectorExceptionCode.CONNECTION_ERROR_EXHAUSTED:
      return 'Could not connect to the API.';
    case ApiConnectorExceptionCode.REQUEST_FAILED:
      return 'The request could not be sent.';
    default:
      return assertUnreachable(code);
  }
};

export class ApiConnectorException extends CustomException<ApiConnectorExceptionCode> {
  constructor(
    message: string,
    code: ApiConnectorExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message, code, {
      userFriendlyMessage:
        userFriendlyMessage ??
        getApiConnectorExceptionUserFriendlyMessage(code),
      details,
    });
  }
}
