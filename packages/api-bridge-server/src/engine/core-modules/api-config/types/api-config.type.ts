import { type ApiAuthConfig } from 'src/engine/core-modules/api-config/types/api-auth-config.type';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type EndpointConfig = {
  name: string;
  method: string;
  // Joined onto baseUrl with URL resolution rules: a relative path replaces
  // the last segment, an absolute URL replaces the whole base.
  path: string;
  headers: Record<string, string>;
  description: string;
  // Documentation of accepted parameters, passed through untouched.
  parameters: StructuredMap;
  responseFormat: string;
};

export type ApiConfig = {
  name: string;
  baseUrl: string;
  description: string;
  enabled: boolean;
  auth: ApiAuthConfig;
  endpoints: Record<string, EndpointConfig>;
};
