import { structuredValueToXml } from 'src/engine/core-modules/response-codec/utils/structured-value-to-xml.util';
import { xmlToStructuredValue } from 'src/engine/core-modules/response-codec/utils/xml-to-structured-value.util';

describe('structuredValueToXml', () => {
  it('should write map entries as child elements and lists as repeated elements', () => {
    expect(structuredValueToXml({ name: 'Ada', tags: ['x', 'y'] })).toBe(
      '<root><name>Ada</name><tags>x</tags><tags>y</tags></root>',
    );
  });

  it('should name unkeyed list items by index', () => {
    expect(structuredValueToXml([1, 'a'])).toBe(
      '<root><item_0>1</item_0><item_1>a</item_1></root>',
    );
  });

  it('should write @attributes and #text entries back as attributes and text', () => {
    expect(
      structuredValueToXml({
        item: { '@attributes': { id: '7' }, '#text': 'hello' },
      }),
    ).toBe('<root><item id="7">hello</item></root>');
  });

  it('should write null as an empty element', () => {
    expect(structuredValueToXml({ missing: null })).toBe(
      '<root><missing></missing></root>',
    );
  });

  it('should sanitise keys that are not valid tag names', () => {
    expect(structuredValueToXml({ 'first name': 'Ada', '1st': 'x' })).toBe(
      '<root><first_name>Ada</first_name><_1st>x</_1st></root>',
    );
  });

  it('should escape markup characters in text', () => {
    expect(structuredValueToXml({ expr: 'a < b & c' })).toBe(
      '<root><expr>a &lt; b &amp; c</expr></root>',
    );
  });

  it('should encode decoded xml back to an equivalent document', () => {
    const decoded = xmlToStructuredValue(
      '<root><item id="1">a</item><item id="2">b</item></root>',
    );

    expect(xmlToStructuredValue(structuredValueToXml(decoded))).toEqual({
      root: decoded,
    });
  });
});
