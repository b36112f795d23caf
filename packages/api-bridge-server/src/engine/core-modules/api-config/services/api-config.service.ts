import { Injectable, Logger } from '@nestjs/common';

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

import { isDefined } from 'api-bridge-shared/utils';

import { DEFAULT_API_CONNECTOR_SETTINGS } from 'src/engine/core-modules/api-config/api-config.constants';
import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';
import { type ApiConnectorSettings } from 'src/engine/core-modules/api-config/types/api-connector-settings.type';
import {
  type ApiConfigValidationResult,
  type ApiSummary,
} from 'src/engine/core-modules/api-config/types/api-summary.type';
import { type ParsedApiConfigFile } from 'src/engine/core-modules/api-config/types/parsed-api-config-file.type';
import { parseApiConfigFile } from 'src/engine/core-modules/api-config/utils/parse-api-config-file.util';
import { collectApiConfigIssues } from 'src/engine/core-modules/api-config/utils/validate-api-config.util';
import { EnvironmentService } from 'src/engine/core-modules/environment/environment.service';

@Injectable()
export class ApiConfigService {
  private readonly logger = new Logger(ApiConfigService.name);
  private configFile: ParsedApiConfigFile | null = null;

  constructor(private readonly environmentService: EnvironmentService) {}

  listApis(): ApiSummary[] {
    return [...this.getConfigFile().apis.values()].map((config) => ({
      name: config.name,
      baseUrl: config.baseUrl,
      description: config.description,
      enabled: config.enabled,
      authType: config.auth.type,
      endpointsCount: Object.keys(config.endpoints).length,
    }));
  }

  getApiConfig(apiName: string): ApiConfig | null {
    return this.getConfigFile().apis.get(apiName) ?? null;
  }

  getDefaultSettings(): ApiConnectorSettings {
    return { ...this.getConfigFile().defaultSettings };
  }

  validateApiConfig(apiName: string): ApiConfigValidationResult {
    const config = this.getApiConfig(apiName);

    if (!isDefined(config) || !config.enabled) {
      return {
        isValid: false,
        message: `API is not configured or is disabled: ${apiName}`,
        errors: [`API is not configured or is disabled: ${apiName}`],
        suggestions: [`Add an enabled "${apiName}" entry under apis`],
      };
    }

    const { errors, suggestions } = collectApiConfigIssues(config);

    return {
      isValid: errors.length === 0,
      message:
        errors.length === 0
          ? 'API configuration is valid'
          : errors.join('; '),
      errors,
      suggestions,
    };
  }

  reload(): void {
    this.configFile = this.load();
    this.logger.log('API configuration reloaded');
  }

  private getConfigFile(): ParsedApiConfigFile {
    if (!isDefined(this.configFile)) {
      this.configFile = this.load();
    }

    return this.configFile;
  }

  private load(): ParsedApiConfigFile {
    const configPath = resolve(
      this.environmentService.get('API_CONFIG_FILE'),
    );

    if (!existsSync(configPath)) {
      this.logger.warn(`API configuration file not found: ${configPath}`);

      return {
        apis: new Map(),
        defaultSettings: { ...DEFAULT_API_CONNECTOR_SETTINGS },
      };
    }

    const parsed = parseApiConfigFile(
      readFileSync(configPath, 'utf-8'),
      process.env,
    );

    this.logger.log(
      `Loaded ${parsed.apis.size} API configuration(s) from ${configPath}`,
    );

    return parsed;
  }
}
