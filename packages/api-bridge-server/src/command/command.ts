import 'reflect-metadata';

import { CommandFactory } from 'nest-commander';

import { CommandModule } from 'src/command/command.module';
import { validateEnvironmentVariables } from 'src/engine/core-modules/environment/environment-variables';
import { EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

const bootstrap = async () => {
  const environmentService = new EnvironmentService(
    validateEnvironmentVariables(process.env),
  );

  await CommandFactory.run(CommandModule, {
    logger: environmentService.getLogLevels(),
    errorHandler: (error) => {
      process.stderr.write(`${error.message}\n`);
      process.exit(1);
    },
  });
};

bootstrap().catch((error: unknown) => {
  process.stderr.write(`${String(error)}\n`);
  process.exit(1);
});
