import {
  areStructurallyEqual,
  canonicalizeStructuredValue,
} from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';
import { toStructuredValue } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';

describe('canonicalizeStructuredValue', () => {
  it('should sort map keys at every depth', () => {
    expect(
      canonicalizeStructuredValue({
        b: 1,
        a: { d: [1, { z: null, y: true }], c: 'x' },
      }),
    ).toBe('{"a":{"c":"x","d":[1,{"y":true,"z":null}]},"b":1}');
  });

  it('should keep list order significant', () => {
    expect(areStructurallyEqual([1, 2], [2, 1])).toBe(false);
    expect(areStructurallyEqual({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
  });
});

describe('toStructuredValue', () => {
  it('should follow json rules for values json cannot hold', () => {
    expect(
      toStructuredValue({
        a: undefined,
        b: Number.NaN,
        c: new Date('2024-01-02T03:04:05.000Z'),
        d: [undefined],
      }),
    ).toEqual({ b: null, c: '2024-01-02T03:04:05.000Z', d: [null] });
  });
});
