import { type ApiAuthType } from 'src/engine/core-modules/api-config/types/api-auth-config.type';

export type ApiSummary = {
  name: string;
  baseUrl: string;
  description: string;
  enabled: boolean;
  authType: ApiAuthType;
  endpointsCount: number;
};

export type ApiConfigValidationResult = {
  isValid: boolean;
  message: string;
  errors: string[];
  suggestions: string[];
};
