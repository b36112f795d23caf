import { Test, type TestingModule } from '@nestjs/testing';

import { ResponseCodecExceptionCode } from 'src/engine/core-modules/response-codec/response-codec.exception';
import { ResponseCodecService } from 'src/engine/core-modules/response-codec/services/response-codec.service';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';

describe('ResponseCodecService', () => {
  let service: ResponseCodecService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ResponseCodecService],
    }).compile();

    service = module.get<ResponseCodecService>(ResponseCodecService);
  });

  describe('decode', () => {
    it('should parse json bodies', () => {
      expect(
        service.decode(
          'application/json; charset=utf-8',
          Buffer.from('{"a":[1,2,{"b":null}]}'),
        ),
      ).toEqual({
        format: 'json',
        data: { a: [1, 2, { b: null }] },
        parseError: null,
      });
    });

    it('should fall back to text when json does not parse', () => {
      const decoded = service.decode('application/json', '{oops');

      expect(decoded.format).toBe('text');
      expect(decoded.data).toBe('{oops');
      expect(decoded.parseError).toMatch(/^JSON parse failed: /);
    });

    it('should parse xml bodies', () => {
      expect(
        service.decode(
          'application/xml',
          '<root><item>1</item><item>2</item></root>',
        ),
      ).toEqual({
        format: 'xml',
        data: { root: { item: ['1', '2'] } },
        parseError: null,
      });
    });

    it('should fall back to text when xml does not parse', () => {
      const decoded = service.decode('text/xml', '<root><a></root>');

      expect(decoded.format).toBe('text');
      expect(decoded.data).toBe('<root><a></root>');
      expect(decoded.parseError).toMatch(/^XML parse failed: /);
    });

    it('should keep other content types as text', () => {
      expect(service.decode('text/plain', 'hello')).toEqual({
        format: 'text',
        data: 'hello',
        parseError: null,
      });
    });
  });

  describe('encode', () => {
    it('should decode json output back to the same value', () => {
      const value: StructuredValue = {
        id: 1,
        ratio: 0.5,
        active: false,
        tags: ['a', { nested: null }],
        empty: {},
      };

      const encoded = service.encode(value, 'json');

      if (!encoded.success || typeof encoded.output !== 'string') {
        throw new Error('expected json text');
      }

      expect(service.decode('application/json', encoded.output).data).toEqual(
        value,
      );
    });

    it('should wrap values into uniform rows for tabular output', () => {
      expect(service.encode(5, 'tabular')).toEqual({
        success: true,
        format: 'tabular',
        output: [{ value: 5 }],
      });
      expect(service.encode([1, 'a'], 'tabular')).toEqual({
        success: true,
        format: 'tabular',
        output: [
          { value: 1, index: 0 },
          { value: 'a', index: 1 },
        ],
      });
      expect(service.encode({ a: 1 }, 'tabular')).toEqual({
        success: true,
        format: 'tabular',
        output: [{ a: 1 }],
      });
    });

    it('should wrap non-list values for list output', () => {
      expect(service.encode('x', 'list')).toEqual({
        success: true,
        format: 'list',
        output: ['x'],
      });
      expect(service.encode([1], 'list')).toEqual({
        success: true,
        format: 'list',
        output: [1],
      });
    });

    it('should accept format names in any case', () => {
      expect(service.encode({ a: 1 }, 'JSON')).toEqual({
        success: true,
        format: 'json',
        output: '{\n  "a": 1\n}',
      });
    });

    it('should report unsupported formats', () => {
      const encoded = service.encode({ a: 1 }, 'yaml');

      expect(encoded.success).toBe(false);
      expect(!encoded.success && encoded.error.code).toBe(
        ResponseCodecExceptionCode.UNSUPPORTED_OUTPUT_FORMAT,
      );
    });

    it('should report csv shape errors instead of throwing', () => {
      const encoded = service.encode([{ a: 1 }, { b: 2 }], 'csv');

      expect(encoded.success).toBe(false);
      expect(!encoded.success && encoded.error.code).toBe(
        ResponseCodecExceptionCode.CSV_HETEROGENEOUS_RECORDS,
      );
    });
  });
});
