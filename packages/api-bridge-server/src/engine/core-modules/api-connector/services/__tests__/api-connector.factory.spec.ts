import { Test, type TestingModule } from '@nestjs/testing';

import { DEFAULT_API_CONNECTOR_SETTINGS } from 'src/engine/core-modules/api-config/api-config.constants';
import { ApiConfigExceptionCode } from 'src/engine/core-modules/api-config/api-config.exception';
import { ApiConfigService } from 'src/engine/core-modules/api-config/services/api-config.service';
import { type ApiConfig } from 'src/engine/core-modules/api-config/types/api-config.type';
import { ApiConnectorFactory } from 'src/engine/core-modules/api-connector/services/api-connector.factory';
import { ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';

const enabledConfig: ApiConfig = {
  name: 'weather',
  baseUrl: 'https://weather.test/v1/',
  description: '',
  enabled: true,
  auth: { type: 'none' },
  endpoints: {},
};

const mockApiConfigService = {
  getApiConfig: jest.fn(),
  getDefaultSettings: jest.fn(),
};

describe('ApiConnectorFactory', () => {
  let factory: ApiConnectorFactory;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApiConnectorFactory,
        ResponseCodecService,
        { provide: ApiConfigService, useValue: mockApiConfigService },
      ],
    }).compile();

    factory = module.get<ApiConnectorFactory>(ApiConnectorFactory);
    mockApiConfigService.getDefaultSettings.mockReturnValue(
      DEFAULT_API_CONNECTOR_SETTINGS,
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should create a connector for an enabled api', async () => {
    mockApiConfigService.getApiConfig.mockReturnValue(enabledConfig);

    const connector = factory.create('weather');

    expect(connector.apiName).toBe('weather');
    expect(mockApiConfigService.getApiConfig).toHaveBeenCalledWith('weather');

    await connector.close();
  });

  it('should throw when the api is not configured', () => {
    mockApiConfigService.getApiConfig.mockReturnValue(null);

    expect(() => factory.create('unknown')).toThrow(
      expect.objectContaining({ code: ApiConfigExceptionCode.API_NOT_FOUND }),
    );
  });

  it('should throw when the api is disabled', () => {
    mockApiConfigService.getApiConfig.mockReturnValue({
      ...enabledConfig,
      enabled: false,
    });

    expect(() => factory.create('weather')).toThrow(
      expect.objectContaining({ code: ApiConfigExceptionCode.API_DISABLED }),
    );
  });
});
