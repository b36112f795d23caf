import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

import {
  API_AUTH_TYPES,
  type ApiAuthType,
} from 'src/engine/core-modules/api-config/types/api-auth-config.type';
import { IsStringRecord } from 'src/utils/validators/is-string-record.validator';

// Shapes of the snake_case JSON configuration file. Each entry of the
// "apis" and "endpoints" maps is validated on its own.

export class ApiAuthInput {
  @IsString()
  @IsOptional()
  key?: string;

  @IsString()
  @IsOptional()
  header_name?: string;

  @IsString()
  @IsOptional()
  token?: string;

  @IsString()
  @IsOptional()
  username?: string;

  @IsString()
  @IsOptional()
  password?: string;

  @IsStringRecord()
  @IsOptional()
  headers?: Record<string, string>;
}

export class EndpointConfigInput {
  @IsString()
  @IsOptional()
  method?: string;

  @IsString()
  @IsOptional()
  path?: string;

  @IsStringRecord()
  @IsOptional()
  headers?: Record<string, string>;

  @IsString()
  @IsOptional()
  description?: string;

  @IsObject()
  @IsOptional()
  parameters?: Record<string, unknown>;

  @IsString()
  @IsOptional()
  response_format?: string;
}

export class ApiConfigInput {
  @IsString()
  @IsOptional()
  base_url?: string;

  @IsString()
  @IsOptional()
  description?: string;

  @IsBoolean()
  @IsOptional()
  enabled?: boolean;

  @IsIn(API_AUTH_TYPES)
  @IsOptional()
  auth_type?: ApiAuthType;

  @IsObject()
  @IsOptional()
  auth?: Record<string, unknown>;

  @IsObject()
  @IsOptional()
  endpoints?: Record<string, unknown>;
}

export class DefaultSettingsInput {
  @IsNumber()
  @Min(0)
  @IsOptional()
  timeout?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  max_retries?: number;

  @IsNumber()
  @Min(0)
  @IsOptional()
  retry_delay?: number;

  @IsString()
  @IsOptional()
  user_agent?: string;

  @IsBoolean()
  @IsOptional()
  verify_ssl?: boolean;

  @IsBoolean()
  @IsOptional()
  follow_redirects?: boolean;
}
