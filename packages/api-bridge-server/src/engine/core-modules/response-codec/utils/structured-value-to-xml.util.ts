import { XMLBuilder } from 'fast-xml-parser';

import {
  type StructuredScalar,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { canonicalizeStructuredValue } from 'src/engine/core-modules/response-codec/utils/canonicalize-structured-value.util';
import {
  isStructuredList,
  isStructuredMap,
  isStructuredScalar,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';
import {
  XML_ATTRIBUTES_KEY,
  XML_TEXT_KEY,
} from 'src/engine/core-modules/response-codec/utils/xml-to-structured-value.util';

const ROOT_TAG_NAME = 'root';
const ATTRIBUTE_NAME_PREFIX = '@_';

type OrderedXmlNode = {
  [name: string]: OrderedXmlNode[] | Record<string, string> | string;
};

type ElementContent = {
  children: OrderedXmlNode[];
  attributes: Record<string, string>;
};

const toXmlName = (key: string): string => {
  const sanitized = key.replace(/[^A-Za-z0-9_.-]/g, '_');

  return /^[A-Za-z_]/.test(sanitized) ? sanitized : `_${sanitized}`;
};

const scalarToText = (value: StructuredScalar): string =>
  value === null ? '' : String(value);

const toText = (value: StructuredValue): string =>
  isStructuredScalar(value)
    ? scalarToText(value)
    : canonicalizeStructuredValue(value);

const toElementContent = (value: StructuredValue): ElementContent => {
  const content: ElementContent = { children: [], attributes: {} };

  if (isStructuredMap(value)) {
    const textNodes: OrderedXmlNode[] = [];

    for (const [key, entry] of Object.entries(value)) {
      if (key === XML_ATTRIBUTES_KEY && isStructuredMap(entry)) {
        for (const [name, attributeValue] of Object.entries(entry)) {
          content.attributes[`${ATTRIBUTE_NAME_PREFIX}${toXmlName(name)}`] =
            toText(attributeValue);
        }
        continue;
      }

      if (key === XML_TEXT_KEY && isStructuredScalar(entry)) {
        textNodes.push({ '#text': scalarToText(entry) });
        continue;
      }

      content.children.push(...toElements(key, entry));
    }

    content.children.unshift(...textNodes);

    return content;
  }

  if (isStructuredList(value)) {
    content.children = value.flatMap((item, index) =>
      toElements(`item_${index}`, item),
    );

    return content;
  }

  if (value !== null) {
    content.children.push({ '#text': scalarToText(value) });
  }

  return content;
};

const toElement = (key: string, value: StructuredValue): OrderedXmlNode => {
  const { children, attributes } = toElementContent(value);
  const node: OrderedXmlNode = { [toXmlName(key)]: children };

  if (Object.keys(attributes).length > 0) {
    node[':@'] = attributes;
  }

  return node;
};

// A list under a key repeats the element once per item.
const toElements = (key: string, value: StructuredValue): OrderedXmlNode[] =>
  isStructuredList(value)
    ? value.map((item) => toElement(key, item))
    : [toElement(key, value)];

export const structuredValueToXml = (value: StructuredValue): string => {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_NAME_PREFIX,
    suppressEmptyNode: false,
  });

  return builder.build([toElement(ROOT_TAG_NAME, value)]);
};
