import { plainToInstance } from 'class-transformer';
import { IsOptional, IsString, Matches, validateSync } from 'class-validator';

const LOG_LEVEL_LIST_PATTERN =
  /^(log|error|warn|debug|verbose|fatal)(,(log|error|warn|debug|verbose|fatal))*$/;

export class EnvironmentVariables {
  @IsString()
  @IsOptional()
  API_CONFIG_FILE = 'config/api-config.json';

  // ":memory:" keeps every database in memory
  @IsString()
  @IsOptional()
  API_DATA_STORAGE_DIR = 'api_data_storage';

  @Matches(LOG_LEVEL_LIST_PATTERN, {
    message:
      'LOG_LEVELS must be a comma-separated list of log, error, warn, debug, verbose, fatal',
  })
  @IsOptional()
  LOG_LEVELS = 'log,warn,error';
}

export const validateEnvironmentVariables = (
  environment: Record<string, string | undefined>,
): EnvironmentVariables => {
  const variables = plainToInstance(EnvironmentVariables, environment, {
    exposeDefaultValues: true,
  });

  const errors = validateSync(variables, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(
      `Invalid environment: ${errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; ')}`,
    );
  }

  return variables;
};
