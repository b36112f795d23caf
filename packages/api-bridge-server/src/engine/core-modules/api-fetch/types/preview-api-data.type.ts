import {
  type DataDescription,
  type DataPreview,
  type PreviewOptions,
} from 'src/engine/core-modules/data-transformer/types/data-preview.type';
import { type ResponseBodyFormat } from 'src/engine/core-modules/response-codec/types/decoded-body.type';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type PreviewApiDataInput = {
  apiName: string;
  endpointName: string;
  params?: StructuredMap;
  options?: Partial<PreviewOptions>;
};

export type PreviewApiDataResult = {
  apiName: string;
  endpointName: string;
  statusCode: number;
  format: ResponseBodyFormat;
  parseError: string | null;
  preview: DataPreview;
};

export type DescribeApiDataInput = Omit<PreviewApiDataInput, 'options'>;

export type DescribeApiDataResult = Omit<PreviewApiDataResult, 'preview'> & {
  description: DataDescription;
};
