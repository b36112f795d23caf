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
import { DataTransformerService } from 'src/engine/core-modules/data-transformer/services/data-transformer.service';

export type ApiFetchCommandOptions = {
  params?: string;
  transform?: string;
  session?: string;
};

@Command({
  name: 'api:fetch',
  arguments: '<api> <endpoint>',
  description:
    'Call an endpoint, optionally transform the data and store it in a session.',
})
export class ApiFetchCommand extends JsonOutputCommandRunner<ApiFetchCommandOptions> {
  protected override readonly logger = new Logger(ApiFetchCommand.name);

  constructor(
    private readonly apiFetchService: ApiFetchService,
    private readonly dataTransformerService: DataTransformerService,
  ) {
    super();
  }

  protected override async execute(
    passedParams: string[],
    options?: ApiFetchCommandOptions,
  ): Promise<CommandResultDocument> {
    const apiName = getRequiredArgument(passedParams, 0, 'api');
    const endpointName = getRequiredArgument(passedParams, 1, 'endpoint');

    const params = options?.params
      ? parseJsonObjectOption('params', options.params)
      : undefined;

    const transform = options?.transform
      ? this.dataTransformerService.parseTransformSpec(
          parseJsonObjectOption('transform', options.transform),
        )
      : undefined;

    return this.apiFetchService.fetchAndStore({
      apiName,
      endpointName,
      params,
      transform,
      sessionId: options?.session,
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
    flags: '-t, --transform <json>',
    description:
      'Transform spec as a JSON object (select_fields, filter_conditions, sort_by, ...)',
  })
  parseTransform(value: string): string {
    return value;
  }

  @Option({
    flags: '-s, --session <sessionId>',
    description: 'Append to this session instead of creating one',
  })
  parseSession(value: string): string {
    return value;
  }
}
