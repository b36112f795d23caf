import { Logger } from '@nestjs/common';

import { Command, Option } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import {
  getRequiredArgument,
  parseJsonObjectOption,
} from 'src/command/utils/command-argument.util';
import { ApiFetchService } from 'src/engine/core-modules/api-fetch/services/api-fetch.service';

export type ApiDescribeCommandOptions = {
  params?: string;
};

@Command({
  name: 'api:describe',
  arguments: '<api> <endpoint>',
  description:
    'Call an endpoint and print the type, size, fields and a sample of its data.',
})
export class ApiDescribeCommand extends JsonOutputCommandRunner<ApiDescribeCommandOptions> {
  protected override readonly logger = new Logger(ApiDescribeCommand.name);

  constructor(private readonly apiFetchService: ApiFetchService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
    options?: ApiDescribeCommandOptions,
  ): Promise<CommandResultDocument> {
    const apiName = getRequiredArgument(passedParams, 0, 'api');
    const endpointName = getRequiredArgument(passedParams, 1, 'endpoint');

    return this.apiFetchService.describe({
      apiName,
      endpointName,
      params: options?.params
        ? parseJsonObjectOption('params', options.params)
        : undefined,
    });
  }

  @Option({
    flags: '-p, --params <json>',
    description: 'Request parameters as a JSON object',
  })
  parseParams(value: string): string {
    return value;
  }
}
