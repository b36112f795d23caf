import { Type } from 'class-transformer';
import {
  Allow,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';

import {
  CONVERSION_TYPES,
  type ConversionType,
  FILTER_OPERATORS,
  type FilterOperator,
} from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import { IsStringRecord } from 'src/utils/validators/is-string-record.validator';

export class FilterConditionInput {
  @IsString()
  field!: string;

  @IsIn(FILTER_OPERATORS)
  @IsOptional()
  operator?: FilterOperator;

  @Allow()
  value?: unknown;
}

export class TransformSpecInput {
  @IsString({ each: true })
  @IsArray()
  @IsOptional()
  select_fields?: string[];

  @IsStringRecord()
  @IsOptional()
  rename_fields?: Record<string, string>;

  @ValidateNested({ each: true })
  @Type(() => FilterConditionInput)
  @IsArray()
  @IsOptional()
  filter_conditions?: FilterConditionInput[];

  @IsString()
  @IsOptional()
  sort_by?: string;

  @IsBoolean()
  @IsOptional()
  sort_desc?: boolean;

  @Min(0)
  @IsInt()
  @IsOptional()
  limit?: number;

  @IsStringRecord(CONVERSION_TYPES)
  @IsOptional()
  type_conversions?: Record<string, ConversionType>;

  @IsStringRecord()
  @IsOptional()
  computed_fields?: Record<string, string>;
}
