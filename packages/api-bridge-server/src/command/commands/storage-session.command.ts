import { Logger } from '@nestjs/common';

import { Command } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { getRequiredArgument } from 'src/command/utils/command-argument.util';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';

@Command({
  name: 'storage:session',
  arguments: '<session>',
  description: 'Show a storage session and its operation log.',
})
export class StorageSessionCommand extends JsonOutputCommandRunner {
  protected override readonly logger = new Logger(StorageSessionCommand.name);

  constructor(private readonly apiDataStorageService: ApiDataStorageService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
  ): Promise<CommandResultDocument> {
    const sessionId = getRequiredArgument(passedParams, 0, 'session');

    const operations =
      await this.apiDataStorageService.getSessionOperations(sessionId);
    const session = await this.apiDataStorageService.getSession(sessionId);

    return { session, operations };
  }
}
