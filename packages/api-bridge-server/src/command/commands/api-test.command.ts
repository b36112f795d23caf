import { Logger } from '@nestjs/common';

import { Command } from 'nest-commander';

import {
  type CommandResultDocument,
  JsonOutputCommandRunner,
} from 'src/command/command-runners/json-output.command-runner';
import { getRequiredArgument } from 'src/command/utils/command-argument.util';
import { ApiConnectorFactory } from 'src/engine/core-modules/api-connector/services/api-connector.factory';

@Command({
  name: 'api:test',
  arguments: '<api>',
  description: 'Send a GET to the base URL of an API and list its endpoints.',
})
export class ApiTestCommand extends JsonOutputCommandRunner {
  protected override readonly logger = new Logger(ApiTestCommand.name);

  constructor(private readonly apiConnectorFactory: ApiConnectorFactory) {
    super();
  }

  protected override async execute(
    passedParams: string[],
  ): Promise<CommandResultDocument> {
    const apiName = getRequiredArgument(passedParams, 0, 'api');
    const connector = this.apiConnectorFactory.create(apiName);

    try {
      const connection = await connector.testConnection();

      return {
        apiName,
        connection,
        endpoints: connector.getEndpoints(),
      };
    } finally {
      await connector.close();
    }
  }
}
