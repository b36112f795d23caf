import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { isDefined, isPlainObject } from 'api-bridge-shared/utils';

import {
  ResponseCodecException,
  ResponseCodecExceptionCode,
} from 'src/engine/core-modules/response-codec/response-codec.exception';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredList } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

export const XML_ATTRIBUTES_KEY = '@attributes';
export const XML_TEXT_KEY = '#text';

// fast-xml-parser ordered-mode node keys
const ORDERED_ATTRIBUTES_KEY = ':@';
const ORDERED_TEXT_KEY = '#text';

const createParser = () =>
  new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });

const getNodeName = (node: Record<string, unknown>): string | undefined =>
  Object.keys(node).find((key) => key !== ORDERED_ATTRIBUTES_KEY);

const isElementName = (name: string): boolean =>
  name !== ORDERED_TEXT_KEY && !name.startsWith('?');

const toAttributeMap = (attributes: unknown): StructuredMap | null => {
  if (!isPlainObject(attributes) || Object.keys(attributes).length === 0) {
    return null;
  }

  return Object.fromEntries(
    Object.entries(attributes).map(([name, value]) => [name, String(value)]),
  );
};

// Attributes go under "@attributes", repeated child tags collapse into a
// list, a text-only element becomes its text and text next to children is
// kept under "#text". An element with nothing in it is null.
const elementToStructuredValue = (
  children: unknown,
  attributes: unknown,
): StructuredValue => {
  const entries = new Map<string, StructuredValue>();
  const textParts: string[] = [];

  const attributeMap = toAttributeMap(attributes);

  if (isDefined(attributeMap)) {
    entries.set(XML_ATTRIBUTES_KEY, attributeMap);
  }

  for (const child of Array.isArray(children) ? children : []) {
    if (!isPlainObject(child)) {
      continue;
    }

    const name = getNodeName(child);

    if (!isDefined(name)) {
      continue;
    }

    if (name === ORDERED_TEXT_KEY) {
      const text = String(child[ORDERED_TEXT_KEY]).trim();

      if (text !== '') {
        textParts.push(text);
      }
      continue;
    }

    if (!isElementName(name)) {
      continue;
    }

    const childValue = elementToStructuredValue(
      child[name],
      child[ORDERED_ATTRIBUTES_KEY],
    );
    const existing = entries.get(name);

    if (existing === undefined) {
      entries.set(name, childValue);
    } else if (isStructuredList(existing)) {
      existing.push(childValue);
    } else {
      entries.set(name, [existing, childValue]);
    }
  }

  const text = textParts.join(' ');

  if (text !== '') {
    if (entries.size === 0) {
      return text;
    }

    entries.set(XML_TEXT_KEY, text);
  }

  return entries.size > 0 ? Object.fromEntries(entries) : null;
};

export const xmlToStructuredValue = (xml: string): StructuredMap => {
  const validation = XMLValidator.validate(xml);

  if (validation !== true) {
    throw new ResponseCodecException(
      `${validation.err.msg} (line ${validation.err.line}, column ${validation.err.col})`,
      ResponseCodecExceptionCode.XML_PARSE_ERROR,
    );
  }

  const nodes: unknown = createParser().parse(xml);

  for (const node of Array.isArray(nodes) ? nodes : []) {
    if (!isPlainObject(node)) {
      continue;
    }

    const name = getNodeName(node);

    if (isDefined(name) && isElementName(name)) {
      return {
        [name]: elementToStructuredValue(
          node[name],
          node[ORDERED_ATTRIBUTES_KEY],
        ),
      };
    }
  }

  throw new ResponseCodecException(
    'XML document has no root element',
    ResponseCodecExceptionCode.XML_PARSE_ERROR,
  );
};
