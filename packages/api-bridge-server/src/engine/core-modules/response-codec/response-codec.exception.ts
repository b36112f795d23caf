import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  CustomException,
  type CustomExceptionOptions,
} from 'src/utils/custom-exception';

export enum ResponseCodecExceptionCode {
  UNSUPPORTED_OUTPUT_FORMAT = 'UNSUPPORTED_OUTPUT_FORMAT',
  CSV_UNSUPPORTED_SHAPE = 'CSV_UNSUPPORTED_SHAPE',
  CSV_HETEROGENEOUS_RECORDS = 'CSV_HETEROGENEOUS_RECORDS',
  XML_PARSE_ERROR = 'XML_PARSE_ERROR',
}

const getResponseCodecExceptionUserFriendlyMessage = (
  code: ResponseCodecExceptionCode,
) => {
  switch (code) {
    case ResponseCodecExceptionCode.UNSUPPORTED_OUTPUT_FORMAT:
      return 'This output format is not supported.';
    case ResponseCodecExceptionCode.CSV_UNSUPPORTED_SHAPE:
      return 'Only an object or a list of objects can be written as CSV.';
    case ResponseCodecExceptionCode.CSV_HETEROGENEOUS_RECORDS:
      return 'Every record must have the same fields to be written as CSV.';
    case ResponseCodecExceptionCode.XML_PARSE_ERROR:
      return 'The response is not well-formed XML.';
    default:
      return assertUnreachable(code);
  }
};

export class ResponseCodecException extends CustomException<ResponseCodecExceptionCode> {
  constructor(
    message: string,
    code: ResponseCodecExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message, code, {
      userFriendlyMessage:
        userFriendlyMessage ??
        getResponseCodecExceptionUserFriendlyMessage(code),
      details,
    });
  }
}
