import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export type StructuredTypeName =
  | 'null'
  | 'boolean'
  | 'number'
  | 'string'
  | 'list'
  | 'map';

export type PreviewOptions = {
  maxRows: number;
  maxCols: number;
  // Only these keys of the top-level map (or of each top-level record).
  fields: string[] | null;
  depth: number;
  showDataTypes: boolean;
  showSummary: boolean;
  truncateLength: number;
};

export type TypeTree = {
  type: StructuredTypeName;
  fields?: Record<string, TypeTree>;
  length?: number;
  itemType?: TypeTree;
};

export type DataDescription = {
  type: StructuredTypeName;
  size: number;
  structure: {
    fields: string[];
    fieldTypes: Record<string, StructuredTypeName>;
  } | null;
  sample: StructuredValue;
};

export type DataPreview = {
  dataType: StructuredTypeName;
  preview: StructuredValue;
  summary: DataDescription | null;
  dataTypes: TypeTree | null;
};
