import {
  type DataPreview,
  type PreviewOptions,
  type TypeTree,
} from 'src/engine/core-modules/data-transformer/types/data-preview.type';
import { describeStructuredValue } from 'src/engine/core-modules/data-transformer/utils/describe-structured-value.util';
import { getStructuredTypeName } from 'src/engine/core-modules/data-transformer/utils/get-structured-type-name.util';
import {
  type StructuredList,
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

export const DEFAULT_PREVIEW_OPTIONS: PreviewOptions = {
  maxRows: 10,
  maxCols: 10,
  fields: null,
  depth: 3,
  showDataTypes: true,
  showSummary: true,
  truncateLength: 100,
};

export const MORE_FIELDS_KEY = '...';

const truncateText = (value: StructuredValue, truncateLength: number) => {
  const text = typeof value === 'string' ? value : JSON.stringify(value);

  return text.length > truncateLength
    ? `${text.slice(0, truncateLength)}...`
    : text;
};

const isContainer = (value: StructuredValue) =>
  isStructuredMap(value) || isStructuredList(value);

const previewValue = (
  value: StructuredValue,
  options: PreviewOptions,
  fields: string[] | null,
  depth: number,
): StructuredValue => {
  if (isStructuredMap(value)) {
    return previewMap(value, options, fields, depth);
  }

  if (isStructuredList(value)) {
    return previewList(value, options, fields, depth);
  }

  return truncateText(value, options.truncateLength);
};

// Containers nested deeper than the remaining depth are shown as JSON text.
const previewMap = (
  record: StructuredMap,
  options: PreviewOptions,
  fields: string[] | null,
  depth: number,
): StructuredMap => {
  const entries = Object.entries(record).filter(
    ([key]) => fields === null || fields.includes(key),
  );
  const preview: StructuredMap = Object.fromEntries(
    entries
      .slice(0, options.maxCols)
      .map(([key, entry]) => [
        key,
        isContainer(entry) && depth > 0
          ? previewValue(entry, options, null, depth - 1)
          : truncateText(entry, options.truncateLength),
      ]),
  );

  if (entries.length > options.maxCols) {
    preview[MORE_FIELDS_KEY] =
      `${entries.length - options.maxCols} more field(s)`;
  }

  return preview;
};

// The field filter applies to the records of a list as it does to a map.
const previewList = (
  items: StructuredList,
  options: PreviewOptions,
  fields: string[] | null,
  depth: number,
): StructuredList => {
  const preview = items
    .slice(0, options.maxRows)
    .map((item) =>
      isContainer(item) && depth > 0
        ? previewValue(item, options, fields, depth - 1)
        : truncateText(item, options.truncateLength),
    );

  if (items.length > options.maxRows) {
    preview.push(`... ${items.length - options.maxRows} more item(s)`);
  }

  return preview;
};

export const buildTypeTree = (
  value: StructuredValue,
  depth: number,
): TypeTree => {
  const type = getStructuredTypeName(value);

  if (depth <= 0) {
    return { type };
  }

  if (isStructuredMap(value)) {
    return {
      type,
      fields: Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [
          key,
          buildTypeTree(entry, depth - 1),
        ]),
      ),
    };
  }

  if (isStructuredList(value) && value.length > 0) {
    return {
      type,
      length: value.length,
      itemType: buildTypeTree(value[0], depth - 1),
    };
  }

  return { type };
};

export const resolvePreviewOptions = (
  options: Partial<PreviewOptions>,
): PreviewOptions => ({
  maxRows: options.maxRows ?? DEFAULT_PREVIEW_OPTIONS.maxRows,
  maxCols: options.maxCols ?? DEFAULT_PREVIEW_OPTIONS.maxCols,
  fields: options.fields ?? DEFAULT_PREVIEW_OPTIONS.fields,
  depth: options.depth ?? DEFAULT_PREVIEW_OPTIONS.depth,
  showDataTypes: options.showDataTypes ?? DEFAULT_PREVIEW_OPTIONS.showDataTypes,
  showSummary: options.showSummary ?? DEFAULT_PREVIEW_OPTIONS.showSummary,
  truncateLength:
    options.truncateLength ?? DEFAULT_PREVIEW_OPTIONS.truncateLength,
});

export const previewStructuredValue = (
  value: StructuredValue,
  options: Partial<PreviewOptions> = {},
): DataPreview => {
  const resolvedOptions = resolvePreviewOptions(options);

  return {
    dataType: getStructuredTypeName(value),
    preview: previewValue(
      value,
      resolvedOptions,
      resolvedOptions.fields,
      resolvedOptions.depth,
    ),
    summary: resolvedOptions.showSummary
      ? describeStructuredValue(value)
      : null,
    dataTypes: resolvedOptions.showDataTypes
      ? buildTypeTree(value, resolvedOptions.depth)
      : null,
  };
};
