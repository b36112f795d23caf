import { Logger } from '@nestjs/common';

import { Command } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { getRequiredArgument } from 'src/command/utils/command-argument.util';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';

@Command({
  name: 'storage:delete-session',
  arguments: '<session>',
  description: 'Delete a session, its operation log and its record database.',
})
export class StorageDeleteSessionCommand extends JsonOutputCommandRunner {
  protected override readonly logger = new Logger(
    StorageDeleteSessionCommand.name,
  );

  constructor(private readonly apiDataStorageService: ApiDataStorageService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
  ): Promise<CommandResultDocument> {
    const sessionId = getRequiredArgument(passedParams, 0, 'session');
    const session = await this.apiDataStorageService.deleteSession(sessionId);

    return { deleted: session };
  }
}
