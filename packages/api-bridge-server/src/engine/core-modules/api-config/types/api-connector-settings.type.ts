export type ApiConnectorSettings = {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  userAgent: string;
  verifySsl: boolean;
  followRedirects: boolean;
};
