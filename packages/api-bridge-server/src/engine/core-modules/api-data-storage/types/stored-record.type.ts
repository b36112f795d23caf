import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type StoredRecord = {
  id: number;
  contentHash: string;
  rawValue: StructuredValue;
  processedValue: StructuredValue | null;
  sourceParams: StructuredMap | null;
  timestamp: Date;
};

export type AppendRecordInput = {
  rawValue: StructuredValue;
  processedValue?: StructuredValue;
  sourceParams?: StructuredMap;
};

export type AppendResult = {
  recordsAdded: number;
  contentHash: string;
};

export type ListRecordsOptions = {
  limit?: number;
  offset?: number;
};
