import { type DecodedBody } from 'src/engine/core-modules/response-codec/types/decoded-body.type';
import { parseStructuredJson } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';
import { xmlToStructuredValue } from 'src/engine/core-modules/response-codec/utils/xml-to-structured-value.util';
import { getErrorMessage } from 'src/utils/get-error-message.util';

// Never throws: a body that claims JSON or XML but does not parse comes back
// as text with parseError set.
export const decodeResponseBody = (
  contentType: string,
  body: Buffer | string,
): DecodedBody => {
  const text = typeof body === 'string' ? body : body.toString('utf-8');
  const normalizedContentType = contentType.toLowerCase();

  if (normalizedContentType.includes('json')) {
    try {
      return {
        format: 'json',
        data: parseStructuredJson(text),
        parseError: null,
      };
    } catch (error) {
      return {
        format: 'text',
        data: text,
        parseError: `JSON parse failed: ${getErrorMessage(error)}`,
      };
    }
  }

  if (normalizedContentType.includes('xml')) {
    try {
      return {
        format: 'xml',
        data: xmlToStructuredValue(text),
        parseError: null,
      };
    } catch (error) {
      return {
        format: 'text',
        data: text,
        parseError: `XML parse failed: ${getErrorMessage(error)}`,
      };
    }
  }

  return { format: 'text', data: text, parseError: null };
};
