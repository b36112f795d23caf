import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type EndpointDescriptor = {
  name: string;
  method: string;
  path: string;
  description: string;
  parameters: StructuredMap;
  responseFormat: string;
};
