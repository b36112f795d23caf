import { type StoredRecord } from 'src/engine/core-modules/api-data-storage/types/stored-record.type';
import { flattenStoredRecords } from 'src/engine/core-modules/api-data-storage/utils/flatten-stored-records.util';

const timestamp = new Date('2025-01-01T10:00:00.000Z');

const buildRecord = (
  id: number,
  rawValue: StoredRecord['rawValue'],
): StoredRecord => ({
  id,
  contentHash: `hash-${id}`,
  rawValue,
  processedValue: null,
  sourceParams: null,
  timestamp,
});

describe('flattenStoredRecords', () => {
  it('should add row id and timestamp columns to map records', () => {
    expect(flattenStoredRecords([buildRecord(1, { city: 'Oslo' })])).toEqual([
      { city: 'Oslo', _id: 1, _timestamp: '2025-01-01T10:00:00.000Z' },
    ]);
  });

  it('should emit one row per map inside a list record', () => {
    expect(
      flattenStoredRecords([
        buildRecord(4, [{ city: 'Oslo' }, 'skipped', { city: 'Rome' }]),
      ]),
    ).toEqual([
      { city: 'Oslo', _id: '4_0', _timestamp: '2025-01-01T10:00:00.000Z' },
      { city: 'Rome', _id: '4_2', _timestamp: '2025-01-01T10:00:00.000Z' },
    ]);
  });

  it('should skip scalar records', () => {
    expect(flattenStoredRecords([buildRecord(2, 'text')])).toEqual([]);
  });
});
