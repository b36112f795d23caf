import { Injectable, type LogLevel } from '@nestjs/common';

import { type EnvironmentVariables } from 'src/engine/core-modules/environment/environment-variables';

const LOG_LEVELS: LogLevel[] = [
  'log',
  'error',
  'warn',
  'debug',
  'verbose',
  'fatal',
];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

@Injectable()
export class EnvironmentService {
  constructor(private readonly variables: EnvironmentVariables) {}

  get<Key extends keyof EnvironmentVariables>(
    key: Key,
  ): EnvironmentVariables[Key] {
    return this.variables[key];
  }

  isInMemoryStorage(): boolean {
    return this.variables.API_DATA_STORAGE_DIR === ':memory:';
  }

  getLogLevels(): LogLevel[] {
    return this.variables.LOG_LEVELS.split(',')
      .map((level) => level.trim())
      .filter(isLogLevel);
  }
}
