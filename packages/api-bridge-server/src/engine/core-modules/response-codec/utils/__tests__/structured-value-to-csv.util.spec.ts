import { ResponseCodecExceptionCode } from 'src/engine/core-modules/response-codec/response-codec.exception';
import { structuredValueToCsv } from 'src/engine/core-modules/response-codec/utils/structured-value-to-csv.util';

describe('structuredValueToCsv', () => {
  it('should use the first record keys as header', () => {
    expect(
      structuredValueToCsv([
        { id: 1, name: 'Ada' },
        { id: 2, name: 'Grace' },
      ]),
    ).toBe('id,name\r\n1,Ada\r\n2,Grace');
  });

  it('should write nested values as json and null as an empty cell', () => {
    expect(
      structuredValueToCsv([
        { id: 1, name: null, tags: ['x'] },
        { id: 2, name: 'Grace', tags: [] },
      ]),
    ).toBe('id,name,tags\r\n1,,"[""x""]"\r\n2,Grace,[]');
  });

  it('should write a single map as one row', () => {
    expect(structuredValueToCsv({ a: true, b: 'text' })).toBe(
      'a,b\r\ntrue,text',
    );
  });

  it('should reject records with different fields', () => {
    expect(() => structuredValueToCsv([{ a: 1 }, { b: 2 }])).toThrow(
      expect.objectContaining({
        code: ResponseCodecExceptionCode.CSV_HETEROGENEOUS_RECORDS,
      }),
    );
  });

  it('should reject a record missing a field named like an object builtin', () => {
    expect(() =>
      structuredValueToCsv([{ constructor: 1 }, { x: 2 }]),
    ).toThrow(
      expect.objectContaining({
        code: ResponseCodecExceptionCode.CSV_HETEROGENEOUS_RECORDS,
        message: 'Record 1 does not have the fields constructor',
      }),
    );
  });

  it('should reject scalars and empty lists', () => {
    expect(() => structuredValueToCsv(42)).toThrow(
      expect.objectContaining({
        code: ResponseCodecExceptionCode.CSV_UNSUPPORTED_SHAPE,
      }),
    );
    expect(() => structuredValueToCsv([])).toThrow(
      expect.objectContaining({
        code: ResponseCodecExceptionCode.CSV_UNSUPPORTED_SHAPE,
      }),
    );
  });
});
