import { assertUnreachable } from 'api-bridge-shared/utils';

import { type ApiAuthConfig } from 'src/engine/core-modules/api-config/types/api-auth-config.type';

// Empty credentials produce no header.
export const buildAuthHeaders = (
  auth: ApiAuthConfig,
): Record<string, string> => {
  switch (auth.type) {
    case 'none':
      return {};
    case 'api_key':
      return auth.key !== '' ? { [auth.headerName]: auth.key } : {};
    case 'bearer':
      return auth.token !== ''
        ? { Authorization: `Bearer ${auth.token}` }
        : {};
    case 'basic': {
      if (auth.username === '' || auth.password === '') {
        return {};
      }

      const encoded = Buffer.from(
        `${auth.username}:${auth.password}`,
      ).toString('base64');

      return { Authorization: `Basic ${encoded}` };
    }
    case 'custom':
      return { ...auth.headers };
    default:
      return assertUnreachable(auth);
  }
};
