import { Injectable } from '@nestjs/common';

import { isDefined } from 'api-bridge-shared/utils';

import {
  ApiConfigException,
  ApiConfigExceptionCode,
} from 'src/engine/core-modules/api-config/api-config.exception';
import { ApiConfigService } from 'src/engine/core-modules/api-config/services/api-config.service';
import {
  ApiConnector,
  type ApiConnectorOptions,
} from 'src/engine/core-modules/api-connector/services/api-connector';
import { ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';

@Injectable()
export class ApiConnectorFactory {
  constructor(
    private readonly apiConfigService: ApiConfigService,
    private readonly responseCodecService: ResponseCodecService,
  ) {}

  create(apiName: string, options: ApiConnectorOptions = {}): ApiConnector {
    const config = this.apiConfigService.getApiConfig(apiName);

    if (!isDefined(config)) {
      throw new ApiConfigException(
        `API not found: ${apiName}`,
        ApiConfigExceptionCode.API_NOT_FOUND,
      );
    }

    if (!config.enabled) {
      throw new ApiConfigException(
        `API is disabled: ${apiName}`,
        ApiConfigExceptionCode.API_DISABLED,
      );
    }

    return new ApiConnector(
      config,
      this.apiConfigService.getDefaultSettings(),
      this.responseCodecService,
      options,
    );
  }
}
