import { assertUnreachable } from 'api-bridge-shared/utils';

import { type ApiAuthConfig } from 'src/engine/core-modules/api-config/types/api-auth-config.type';
import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';

type ValidationIssues = {
  errors: string[];
  suggestions: string[];
};

const isAbsoluteUrl = (value: string): boolean => {
  try {
    const url = new URL(value);

    return url.protocol !== '' && url.host !== '';
  } catch {
    return false;
  }
};

const collectAuthIssues = (auth: ApiAuthConfig, issues: ValidationIssues) => {
  switch (auth.type) {
    case 'none':
      return;
    case 'api_key':
      if (auth.key === '' || auth.headerName === '') {
        issues.errors.push(
          'API key authentication is missing key or header_name',
        );
        issues.suggestions.push('Set auth.key and optionally auth.header_name');
      }

      return;
    case 'bearer':
      if (auth.token === '') {
        issues.errors.push('Bearer authentication is missing token');
        issues.suggestions.push('Set auth.token');
      }

      return;
    case 'basic':
      if (auth.username === '' || auth.password === '') {
        issues.errors.push(
          'Basic authentication is missing username or password',
        );
        issues.suggestions.push('Set auth.username and auth.password');
      }

      return;
    case 'custom':
      if (Object.keys(auth.headers).length === 0) {
        issues.errors.push('Custom authentication has no headers');
        issues.suggestions.push('Set auth.headers to the headers to send');
      }

      return;
    default:
      return assertUnreachable(auth);
  }
};

export const collectApiConfigIssues = (config: ApiConfig): ValidationIssues => {
  const issues: ValidationIssues = { errors: [], suggestions: [] };

  if (config.baseUrl === '') {
    issues.errors.push('Missing required field: base_url');
    issues.suggestions.push('Add a base_url to the API configuration');
  } else if (!isAbsoluteUrl(config.baseUrl)) {
    issues.errors.push('base_url is not an absolute URL');
    issues.suggestions.push(
      'Make sure base_url includes a scheme (http/https) and a host',
    );
  }

  collectAuthIssues(config.auth, issues);

  const endpoints = Object.values(config.endpoints);

  if (endpoints.length === 0) {
    issues.errors.push('No endpoints are configured');
    issues.suggestions.push('Add at least one entry under endpoints');
  }

  for (const endpoint of endpoints) {
    if (endpoint.path === '') {
      issues.errors.push(`Endpoint ${endpoint.name} is missing path`);
      issues.suggestions.push(`Add a path to endpoint ${endpoint.name}`);
    }
  }

  return issues;
};
