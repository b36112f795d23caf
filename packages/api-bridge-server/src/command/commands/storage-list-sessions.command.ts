import { Logger } from '@nestjs/common';

import { Command } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';

@Command({
  name: 'storage:list-sessions',
  description: 'List storage sessions, newest first.',
})
export class StorageListSessionsCommand extends JsonOutputCommandRunner {
  protected override readonly logger = new Logger(
    StorageListSessionsCommand.name,
  );

  constructor(private readonly apiDataStorageService: ApiDataStorageService) {
    super();
  }

  protected override async execute(): Promise<CommandResultDocument> {
    const sessions = await this.apiDataStorageService.listSessions();

    return { total: sessions.length, sessions };
  }
}
