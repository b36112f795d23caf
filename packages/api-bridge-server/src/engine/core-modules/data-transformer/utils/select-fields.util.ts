import { hasField, mapRecords } from 'src/engine/core-modules/data-transformer/utils/map-records.util';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

export const selectFields = (
  value: StructuredValue,
  fields: string[],
): StructuredValue =>
  mapRecords(value, (record) =>
    Object.fromEntries(
      fields
        .filter((field) => hasField(record, field))
        .map((field) => [field, record[field]]),
    ),
  );

export const renameFields = (
  value: StructuredValue,
  renames: Record<string, string>,
): StructuredValue =>
  mapRecords(value, (record) =>
    Object.fromEntries(
      Object.entries(record).map(([key, entry]) => [
        Object.hasOwn(renames, key) ? renames[key] : key,
        entry,
      ]),
    ),
  );
