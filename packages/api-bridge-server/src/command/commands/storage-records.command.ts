import { Logger } from '@nestjs/common';

import { Command, Option } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import {
  assertNonNegativeInteger,
  getRequiredArgument,
  parseNumberOption,
} from 'src/command/utils/command-argument.util';
import { ApiDataStorageService } from 'src/engine/core-modules/api-data-storage/services/api-data-storage.service';

export type StorageRecordsCommandOptions = {
  limit?: number;
  offset?: number;
  tabular?: boolean;
};

@Command({
  name: 'storage:records',
  arguments: '<session>',
  description: 'Print the records of a session, newest first.',
})
export class StorageRecordsCommand extends JsonOutputCommandRunner<StorageRecordsCommandOptions> {
  protected override readonly logger = new Logger(StorageRecordsCommand.name);

  constructor(private readonly apiDataStorageService: ApiDataStorageService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
    options?: StorageRecordsCommandOptions,
  ): Promise<CommandResultDocument> {
    const sessionId = getRequiredArgument(passedParams, 0, 'session');
    const listOptions = {
      limit: assertNonNegativeInteger('limit', options?.limit),
      offset: assertNonNegativeInteger('offset', options?.offset),
    };

    if (options?.tabular === true) {
      const rows = await this.apiDataStorageService.listTabularRows(
        sessionId,
        listOptions,
      );

      return { sessionId, total: rows.length, rows };
    }

    const records = await this.apiDataStorageService.listRecords(
      sessionId,
      listOptions,
    );

    return { sessionId, total: records.length, records };
  }

  @Option({
    flags: '-l, --limit <count>',
    description: 'Maximum number of records',
  })
  parseLimit(value: string): number {
    return parseNumberOption(value);
  }

  @Option({
    flags: '-o, --offset <count>',
    description: 'Number of newest records to skip',
  })
  parseOffset(value: string): number {
    return parseNumberOption(value);
  }

  @Option({
    flags: '--tabular',
    description: 'Flatten records into rows with _id and _timestamp columns',
  })
  parseTabular(): boolean {
    return true;
  }
}
