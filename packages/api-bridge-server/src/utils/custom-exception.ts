export type CustomExceptionOptions = {
  userFriendlyMessage?: string;
  details?: Record<string, unknown>;
};

export abstract class CustomException<
  ExceptionCode extends string = string,
> extends Error {
  readonly code: ExceptionCode;
  readonly userFriendlyMessage: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ExceptionCode,
    { userFriendlyMessage, details }: CustomExceptionOptions = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.userFriendlyMessage = userFriendlyMessage ?? message;
    this.details = details;
  }
}
