import { type Logger } from '@nestjs/common';

import { CommandRunner } from 'nest-commander';

import { CustomException } from 'src/utils/custom-exception';
import { getErrorMessage } from 'src/utils/get-error-message.util';

export const UNEXPECTED_ERROR_CODE = 'UNEXPECTED_ERROR';

export type CommandResultDocument = Record<string, unknown>;

export type CommandErrorDocument = {
  status: 'error';
  code: string;
  message: string;
};

export const toCommandErrorDocument = (
  error: unknown,
): CommandErrorDocument =>
  error instanceof CustomException
    ? { status: 'error', code: error.code, message: error.message }
    : {
        status: 'error',
        code: UNEXPECTED_ERROR_CODE,
        message: getErrorMessage(error),
      };

// Every command prints exactly one JSON document on stdout. Failures become
// an error document and a non-zero exit code instead of a thrown error.
export abstract class JsonOutputCommandRunner<
  Options extends object = object,
> extends CommandRunner {
  protected abstract readonly logger: Logger;

  protected abstract execute(
    passedParams: string[],
    options?: Options,
  ): Promise<CommandResultDocument>;

  override async run(passedParams: string[], options?: Options): Promise<void> {
    try {
      const result = await this.execute(passedParams, options);

      this.print({ status: 'success', ...result });
    } catch (error) {
      this.logger.error(getErrorMessage(error));
      this.print(toCommandErrorDocument(error));
      process.exitCode = 1;
    }
  }

  protected print(document: CommandResultDocument): void {
    process.stdout.write(`${JSON.stringify(document, null, 2)}\n`);
  }
}
