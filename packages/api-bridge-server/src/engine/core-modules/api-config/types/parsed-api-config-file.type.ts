import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';
import { type ApiConnectorSettings } from 'src/engine/core-modules/api-config/types/api-connector-settings.type';

export type ParsedApiConfigFile = {
  apis: Map<string, ApiConfig>;
  defaultSettings: ApiConnectorSettings;
};
