export const API_AUTH_TYPES = [
  'none',
  'api_key',
  'bearer',
  'basic',
  'custom',
] as const;

export type ApiAuthType = (typeof API_AUTH_TYPES)[number];

export type NoAuthConfig = {
  type: 'none';
};

export type ApiKeyAuthConfig = {
  type: 'api_key';
  headerName: string;
  key: string;
};

export type BearerAuthConfig = {
  type: 'bearer';
  token: string;
};

export type BasicAuthConfig = {
  type: 'basic';
  username: string;
  password: string;
};

export type CustomAuthConfig = {
  type: 'custom';
  headers: Record<string, string>;
};

export type ApiAuthConfig =
  | NoAuthConfig
  | ApiKeyAuthConfig
  | BearerAuthConfig
  | BasicAuthConfig
  | CustomAuthConfig;
