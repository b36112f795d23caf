import {
  limitRecords,
  sortRecords,
} from 'src/engine/core-modules/data-transformer/utils/sort-records.util';
import { type StructuredMap } from 'src/engine/core-modules/response-codec/types/structured-value.type';

describe('sortRecords', () => {
  it('should sort a missing field as zero', () => {
    const records: StructuredMap[] = [{ a: 3 }, { b: 1 }, { a: -1 }];

    expect(sortRecords(records, 'a', false)).toEqual([
      { a: -1 },
      { b: 1 },
      { a: 3 },
    ]);
    expect(sortRecords(records, 'a', true)).toEqual([
      { a: 3 },
      { b: 1 },
      { a: -1 },
    ]);
  });

  it('should keep the original order of equal keys when descending', () => {
    const records: StructuredMap[] = [
      { a: 1, id: 'x' },
      { a: 0, id: 'y' },
      { a: 1, id: 'z' },
    ];

    expect(sortRecords(records, 'a', true)).toEqual([
      { a: 1, id: 'x' },
      { a: 1, id: 'z' },
      { a: 0, id: 'y' },
    ]);
  });

  it('should sort strings lexicographically', () => {
    expect(
      sortRecords([{ n: 'pear' }, { n: 'apple' }, { n: 'fig' }], 'n', false),
    ).toEqual([{ n: 'apple' }, { n: 'fig' }, { n: 'pear' }]);
  });

  it('should use scalar items as their own key', () => {
    expect(sortRecords([3, 1, 2], 'ignored', false)).toEqual([1, 2, 3]);
  });
});

describe('limitRecords', () => {
  it('should keep the first items of a list', () => {
    expect(limitRecords([1, 2, 3], 2)).toEqual([1, 2]);
  });

  it('should leave maps unchanged', () => {
    expect(limitRecords({ a: 1 }, 0)).toEqual({ a: 1 });
  });
});
