import { type StoredRecord } from 'src/engine/core-modules/api-data-storage/types/stored-record.type';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

export const ROW_ID_COLUMN = '_id';
export const ROW_TIMESTAMP_COLUMN = '_timestamp';

// One row per stored map, or per map inside a stored list (with an
// "<id>_<index>" row id). Scalar records produce no row.
export const flattenStoredRecords = (
  records: StoredRecord[],
): StructuredMap[] =>
  records.flatMap(({ id, rawValue, timestamp }): StructuredMap[] => {
    const rowTimestamp = timestamp.toISOString();

    if (isStructuredMap(rawValue)) {
      return [
        {
          ...rawValue,
          [ROW_ID_COLUMN]: id,
          [ROW_TIMESTAMP_COLUMN]: rowTimestamp,
        },
      ];
    }

    if (isStructuredList(rawValue)) {
      return rawValue.flatMap((item, index): StructuredMap[] =>
        isStructuredMap(item)
          ? [
              {
                ...item,
                [ROW_ID_COLUMN]: `${id}_${index}`,
                [ROW_TIMESTAMP_COLUMN]: rowTimestamp,
              },
            ]
          : [],
      );
    }

    return [];
  });
