import { type SkippedTransformStep } from 'src/engine/core-modules/data-transformer/types/transform-report.type';
import { type TransformSpec } from 'src/engine/core-modules/data-transformer/types/transform-spec.type';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type FetchAndStoreInput = {
  apiName: string;
  endpointName: string;
  params?: StructuredMap;
  transform?: TransformSpec;
  // A new session is created when omitted.
  sessionId?: string;
};

export type FetchAndStoreResult = {
  apiName: string;
  endpointName: string;
  sessionId: string;
  sessionCreated: boolean;
  recordsAdded: number;
  contentHash: string;
  statusCode: number;
  attempts: number;
  parseError: string | null;
  skippedSteps: SkippedTransformStep[];
  // The response data when it is small enough to show inline.
  preview: StructuredValue | null;
};
