import { type ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { assertUnreachable, isDefined } from 'api-bridge-shared/utils';

import {
  DEFAULT_API_CONNECTOR_SETTINGS,
  DEFAULT_API_KEY_HEADER_NAME,
  DEFAULT_ENDPOINT_METHOD,
  DEFAULT_RESPONSE_FORMAT,
} from 'src/engine/core-modules/api-config/api-config.constants';
import {
  ApiConfigException,
  ApiConfigExceptionCode,
} from 'src/engine/core-modules/api-config/api-config.exception';
import {
  ApiAuthInput,
  ApiConfigInput,
  DefaultSettingsInput,
  EndpointConfigInput,
} from 'src/engine/core-modules/api-config/dtos/api-config-file.input';
import {
  type ApiAuthConfig,
  type ApiAuthType,
} from 'src/engine/core-modules/api-config/types/api-auth-config.type';
import {
  type ApiConfig,
  type EndpointConfig,
} from 'src/engine/core-modules/api-config/types/api-config.type';
import { type ApiConnectorSettings } from 'src/engine/core-modules/api-config/types/api-connector-settings.type';
import { type ParsedApiConfigFile } from 'src/engine/core-modules/api-config/types/parsed-api-config-file.type';
import { substituteEnvironmentVariables } from 'src/engine/core-modules/api-config/utils/substitute-environment-variables.util';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredMap } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';
import { parseStructuredJson } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';
import { getErrorMessage } from 'src/utils/get-error-message.util';

const validateInput = <T extends object>(
  inputClass: ClassConstructor<T>,
  value: StructuredValue | undefined,
  path: string,
  errors: string[],
): T | null => {
  if (value === undefined || !isStructuredMap(value)) {
    errors.push(`${path} must be an object`);

    return null;
  }

  const input = plainToInstance(inputClass, value);
  const validationErrors = validateSync(input);

  for (const validationError of validationErrors) {
    for (const constraint of Object.values(validationError.constraints ?? {})) {
      errors.push(`${path}: ${constraint}`);
    }
  }

  return validationErrors.length === 0 ? input : null;
};

const toAuthConfig = (
  authType: ApiAuthType,
  auth: ApiAuthInput,
): ApiAuthConfig => {
  switch (authType) {
    case 'none':
      return { type: 'none' };
    case 'api_key':
      return {
        type: 'api_key',
        key: auth.key ?? '',
        headerName: auth.header_name ?? DEFAULT_API_KEY_HEADER_NAME,
      };
    case 'bearer':
      return { type: 'bearer', token: auth.token ?? '' };
    case 'basic':
      return {
        type: 'basic',
        username: auth.username ?? '',
        password: auth.password ?? '',
      };
    case 'custom':
      return { type: 'custom', headers: auth.headers ?? {} };
    default:
      return assertUnreachable(authType);
  }
};

const toEndpointConfig = (
  name: string,
  input: EndpointConfigInput,
  raw: StructuredMap,
): EndpointConfig => {
  const parameters = raw.parameters ?? null;

  return {
    name,
    method: (input.method ?? DEFAULT_ENDPOINT_METHOD).toUpperCase(),
    path: input.path ?? '',
    headers: input.headers ?? {},
    description: input.description ?? '',
    parameters: isStructuredMap(parameters) ? parameters : {},
    responseFormat: input.response_format ?? DEFAULT_RESPONSE_FORMAT,
  };
};

const parseApiConfig = (
  name: string,
  raw: StructuredValue,
  errors: string[],
): ApiConfig | null => {
  const path = `apis.${name}`;
  const input = validateInput(ApiConfigInput, raw, path, errors);

  if (!isDefined(input) || !isStructuredMap(raw)) {
    return null;
  }

  const auth = isDefined(raw.auth)
    ? validateInput(ApiAuthInput, raw.auth, `${path}.auth`, errors)
    : new ApiAuthInput();

  const endpoints: Record<string, EndpointConfig> = {};
  const rawEndpoints = raw.endpoints ?? {};

  if (isStructuredMap(rawEndpoints)) {
    for (const [endpointName, rawEndpoint] of Object.entries(rawEndpoints)) {
      const endpointInput = validateInput(
        EndpointConfigInput,
        rawEndpoint,
        `${path}.endpoints.${endpointName}`,
        errors,
      );

      if (isDefined(endpointInput) && isStructuredMap(rawEndpoint)) {
        endpoints[endpointName] = toEndpointConfig(
          endpointName,
          endpointInput,
          rawEndpoint,
        );
      }
    }
  }

  if (!isDefined(auth)) {
    return null;
  }

  return {
    name,
    baseUrl: input.base_url ?? '',
    description: input.description ?? '',
    enabled: input.enabled ?? true,
    auth: toAuthConfig(input.auth_type ?? 'none', auth),
    endpoints,
  };
};

const toConnectorSettings = (
  input: DefaultSettingsInput,
): ApiConnectorSettings => {
  const defaults = DEFAULT_API_CONNECTOR_SETTINGS;

  return {
    timeoutMs: isDefined(input.timeout)
      ? Math.round(input.timeout * 1000)
      : defaults.timeoutMs,
    maxRetries: input.max_retries ?? defaults.maxRetries,
    retryDelayMs: isDefined(input.retry_delay)
      ? Math.round(input.retry_delay * 1000)
      : defaults.retryDelayMs,
    userAgent: input.user_agent ?? defaults.userAgent,
    verifySsl: input.verify_ssl ?? defaults.verifySsl,
    followRedirects: input.follow_redirects ?? defaults.followRedirects,
  };
};

// Parses the JSON configuration file. Times are given in seconds in the file
// and converted to milliseconds.
export const parseApiConfigFile = (
  content: string,
  environment: Record<string, string | undefined>,
): ParsedApiConfigFile => {
  let parsed: StructuredValue;

  try {
    parsed = parseStructuredJson(content);
  } catch (error) {
    throw new ApiConfigException(
      `API configuration is not valid JSON: ${getErrorMessage(error)}`,
      ApiConfigExceptionCode.INVALID_API_CONFIG,
    );
  }

  const document = substituteEnvironmentVariables(parsed, environment);
  const errors: string[] = [];

  if (!isStructuredMap(document)) {
    throw new ApiConfigException(
      'API configuration must be a JSON object',
      ApiConfigExceptionCode.INVALID_API_CONFIG,
    );
  }

  const apis = new Map<string, ApiConfig>();
  const rawApis = document.apis ?? {};

  if (isStructuredMap(rawApis)) {
    for (const [name, rawApi] of Object.entries(rawApis)) {
      const apiConfig = parseApiConfig(name, rawApi, errors);

      if (isDefined(apiConfig)) {
        apis.set(name, apiConfig);
      }
    }
  } else {
    errors.push('apis must be an object');
  }

  const settingsInput = validateInput(
    DefaultSettingsInput,
    document.default_settings ?? {},
    'default_settings',
    errors,
  );

  if (errors.length > 0 || !isDefined(settingsInput)) {
    throw new ApiConfigException(
      `Invalid API configuration: ${errors.join('; ')}`,
      ApiConfigExceptionCode.INVALID_API_CONFIG,
      { details: { errors } },
    );
  }

  return { apis, defaultSettings: toConnectorSettings(settingsInput) };
};
