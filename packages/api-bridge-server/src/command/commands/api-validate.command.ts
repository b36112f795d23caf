import { Logger } from '@nestjs/common';

import { Command } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { getRequiredArgument } from 'src/command/utils/command-argument.util';
import { ApiConfigService } from 'src/engine/core-modules/api-config/services/api-config.service';

@Command({
  name: 'api:validate',
  arguments: '<api>',
  description: 'Check an API configuration and suggest fixes.',
})
export class ApiValidateCommand extends JsonOutputCommandRunner {
  protected override readonly logger = new Logger(ApiValidateCommand.name);

  constructor(private readonly apiConfigService: ApiConfigService) {
    super();
  }

  protected override async execute(
    passedParams: string[],
  ): Promise<CommandResultDocument> {
    const apiName = getRequiredArgument(passedParams, 0, 'api');

    return { apiName, ...this.apiConfigService.validateApiConfig(apiName) };
  }
}
