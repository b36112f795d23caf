import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';
import { buildApiRequest } from 'src/engine/core-modules/api-connector/utils/build-api-request.util';
import { buildAuthHeaders } from 'src/engine/core-modules/api-connector/utils/build-auth-headers.util';

const createConfig = (overrides: Partial<ApiConfig> = {}): ApiConfig => ({
  name: 'weather',
  baseUrl: 'https://weather.test/v1/',
  description: '',
  enabled: true,
  auth: { type: 'bearer', token: 'test-secret' },
  endpoints: {},
  ...overrides,
});

const createEndpoint = (
  method: string,
  path: string,
  headers: Record<string, string> = {},
) => ({
  name: 'endpoint',
  method,
  path,
  headers,
  description: '',
  parameters: {},
  responseFormat: 'json',
});

describe('buildApiRequest', () => {
  it('should put GET params in the query string', () => {
    const request = buildApiRequest(
      createConfig(),
      createEndpoint('GET', 'forecast'),
      { city: 'Paris', days: 3, units: null, tags: ['a', 'b'] },
      'test-agent/1.0',
    );

    expect(request.method).toBe('GET');
    expect(request.url).toBe(
      'https://weather.test/v1/forecast?city=Paris&days=3&tags=a&tags=b',
    );
    expect(request.body).toBeUndefined();
    expect(request.headers.get('accept')).toBe(
      'application/json, application/xml, text/plain, */*',
    );
    expect(request.headers.get('user-agent')).toBe('test-agent/1.0');
    expect(request.headers.get('authorization')).toBe('Bearer test-secret');
  });

  it('should let endpoint headers override auth headers', () => {
    const request = buildApiRequest(
      createConfig({
        auth: { type: 'api_key', key: 'test-secret', headerName: 'X-API-Key' },
      }),
      createEndpoint('GET', 'forecast', { 'x-api-key': 'override' }),
      {},
      'test-agent/1.0',
    );

    expect(request.headers.get('X-API-Key')).toBe('override');
  });

  it('should send other methods as a json body', () => {
    const request = buildApiRequest(
      createConfig(),
      createEndpoint('post', 'reports'),
      { name: 'Ada', tags: ['x'] },
      'test-agent/1.0',
    );

    expect(request.method).toBe('POST');
    expect(request.url).toBe('https://weather.test/v1/reports');
    expect(request.body).toBe('{"name":"Ada","tags":["x"]}');
    expect(request.headers.get('content-type')).toBe('application/json');
  });

  it('should form-encode the body when the content type asks for it', () => {
    const request = buildApiRequest(
      createConfig(),
      createEndpoint('PUT', 'reports', {
        'Content-Type': 'application/x-www-form-urlencoded',
      }),
      { a: '1', b: [1, 2] },
      'test-agent/1.0',
    );

    expect(request.body?.toString()).toBe('a=1&b=1&b=2');
  });

  it('should not send a body without params', () => {
    const request = buildApiRequest(
      createConfig(),
      createEndpoint('POST', 'reports'),
      {},
      'test-agent/1.0',
    );

    expect(request.body).toBeUndefined();
    expect(request.headers.get('content-type')).toBeNull();
  });

  it('should let an absolute path replace the base url', () => {
    const request = buildApiRequest(
      createConfig(),
      createEndpoint('GET', 'https://other.test/x'),
      {},
      'test-agent/1.0',
    );

    expect(request.url).toBe('https://other.test/x');
  });
});

describe('buildAuthHeaders', () => {
  it('should encode basic credentials', () => {
    expect(
      buildAuthHeaders({ type: 'basic', username: 'user', password: 'pass' }),
    ).toEqual({ Authorization: 'Basic dXNlcjpwYXNz' });
  });

  it('should copy custom headers verbatim', () => {
    expect(
      buildAuthHeaders({ type: 'custom', headers: { 'X-Tenant': 'acme' } }),
    ).toEqual({ 'X-Tenant': 'acme' });
  });

  it('should skip empty credentials', () => {
    expect(
      buildAuthHeaders({ type: 'api_key', key: '', headerName: 'X-API-Key' }),
    ).toEqual({});
  });
});
