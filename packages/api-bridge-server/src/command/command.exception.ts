import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  CustomException,
  type CustomExceptionOptions,
} from 'src/utils/custom-exception';

export enum CommandExceptionCode {
  MISSING_ARGUMENT = 'MISSING_ARGUMENT',
  INVALID_OPTION = 'INVALID_OPTION',
}

const getCommandExceptionUserFriendlyMessage = (code: CommandExceptionCode) => {
  switch (code) {
    case CommandExceptionCode.MISSING_ARGUMENT:
      return 'A required argument is missing.';
    case CommandExceptionCode.INVALID_OPTION:
      return 'An option has an invalid value.';
    default:
      return assertUnreachable(code);
  }
};

export class CommandException extends CustomException<CommandExceptionCode> {
  constructor(
    message: string,
    code: CommandExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message, code, {
      userFriendlyMessage:
        userFriendlyMessage ?? getCommandExceptionUserFriendlyMessage(code),
      details,
    });
  }
}
