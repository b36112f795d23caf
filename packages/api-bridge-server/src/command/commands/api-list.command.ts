import { Logger } from '@nestjs/common';

import { Command } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { ApiConfigService } from 'src/engine/core-modules/api-config/services/api-config.service';

@Command({
  name: 'api:list',
  description: 'List the configured APIs without their credentials.',
})
export class ApiListCommand extends JsonOutputCommandRunner {
  protected override readonly logger = new Logger(ApiListCommand.name);

  constructor(private readonly apiConfigService: ApiConfigService) {
    super();
  }

  protected override async execute(): Promise<CommandResultDocument> {
    const apis = this.apiConfigService.listApis();

    return { total: apis.length, apis };
  }
}
