import { Logger } from '@nestjs/common';

import { Command, Option } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { getRequiredArgument } from 'src/command/utils/command-argument.util';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';

export type StorageCreateSessionCommandOptions = {
  description?: string;
};

@Command({
  name: 'storage:create-session',
  arguments: '<name> <api> <endpoint>',
  description: 'Create an empty storage session for data from one endpoint.',
})
export class StorageCreateSessionCommand extends JsonOutputCommandRunner<StorageCreateSessionCommandOptions> {
  protected override readonly logger = new Logger(
    StorageCreateSessionCommand.name,
  );

  constructor(private readonly apiDataStorageService: ApiDataStorageService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
    options?: StorageCreateSessionCommandOptions,
  ): Promise<CommandResultDocument> {
    const session = await this.apiDataStorageService.createSession({
      name: getRequiredArgument(passedParams, 0, 'name'),
      apiName: getRequiredArgument(passedParams, 1, 'api'),
      endpointName: getRequiredArgument(passedParams, 2, 'endpoint'),
      description: options?.description,
    });

    return { session };
  }

  @Option({
    flags: '-d, --description <text>',
    description: 'What the session collects',
  })
  parseDescription(value: string): string {
    return value;
  }
}
