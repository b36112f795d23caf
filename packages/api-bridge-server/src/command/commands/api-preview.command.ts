import { Logger } from '@nestjs/common';

import { Command, Option } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import {
  assertNonNegativeInteger,
  getRequiredArgument,
  parseJsonObjectOption,
  parseListOption,
  parseNumberOption,
} from 'src/command/utils/command-argument.util';
import { ApiFetchService } from 'src/engine/core-modules/api-fetch/services/api-fetch.service';

export type ApiPreviewCommandOptions = {
  params?: string;
  maxRows?: number;
  maxCols?: number;
  fields?: string[];
  depth?: number;
  truncateLength?: number;
  types?: boolean;
  summary?: boolean;
};

@Command({
  name: 'api:preview',
  arguments: '<api> <endpoint>',
  description: 'Call an endpoint and print a bounded preview without storing it.',
})
export class ApiPreviewCommand extends JsonOutputCommandRunner<ApiPreviewCommandOptions> {
  protected override readonly logger = new Logger(ApiPreviewCommand.name);

  constructor(private readonly apiFetchService: ApiFetchService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
    options?: ApiPreviewCommandOptions,
  ): Promise<CommandResultDocument> {
    const apiName = getRequiredArgument(passedParams, 0, 'api');
    const endpointName = getRequiredArgument(passedParams, 1, 'endpoint');

    return this.apiFetchService.preview({
      apiName,
      endpointName,
      params: options?.params
        ? parseJsonObjectOption('params', options.params)
        : undefined,
      options: {
        maxRows: assertNonNegativeInteger('max-rows', options?.maxRows),
        maxCols: assertNonNegativeInteger('max-cols', options?.maxCols),
        fields: options?.fields,
        depth: assertNonNegativeInteger('depth', options?.depth),
        truncateLength: assertNonNegativeInteger(
          'truncate-length',
          options?.truncateLength,
        ),
        showDataTypes: options?.types,
        showSummary: options?.summary,
      },
    });
  }

  @Option({
    flags: '-p, --params <json>',
    description: 'Request parameters as a JSON object',
  })
  parseParams(value: string): string {
    return value;
  }

  @Option({
    flags: '--max-rows <count>',
    description: 'Maximum number of list items to show',
  })
  parseMaxRows(value: string): number {
    return parseNumberOption(value);
  }

  @Option({
    flags: '--max-cols <count>',
    description: 'Maximum number of fields to show per map',
  })
  parseMaxCols(value: string): number {
    return parseNumberOption(value);
  }

  @Option({
    flags: '--fields <names>',
    description: 'Comma-separated fields to keep in each record',
  })
  parseFields(value: string): string[] {
    return parseListOption(value);
  }

  @Option({
    flags: '--depth <levels>',
    description: 'How many levels of nesting to expand',
  })
  parseDepth(value: string): number {
    return parseNumberOption(value);
  }

  @Option({
    flags: '--truncate-length <characters>',
    description: 'Maximum length of a collapsed value',
  })
  parseTruncateLength(value: string): number {
    return parseNumberOption(value);
  }

  @Option({
    flags: '--types',
    description: 'Include the type tree of the data',
  })
  parseTypes(): boolean {
    return true;
  }

  @Option({
    flags: '--summary',
    description: 'Include a summary of the data',
  })
  parseSummary(): boolean {
    return true;
  }
}
