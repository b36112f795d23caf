import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { isStructuredMap } from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';
import { parseStructuredJson } from 'src/engine/core-modules/response-codec/utils/to-structured-value.util';

const ERROR_TEXT_EXCERPT_LENGTH = 200;

export const ERROR_BODY_EXCERPT_LENGTH = 1000;

const toMessageText = (value: StructuredValue): string =>
  typeof value === 'string' ? value : JSON.stringify(value);

// "HTTP 404: Not found" using the JSON body's message or error field, or the
// start of the body text when it is not JSON.
export const buildHttpErrorMessage = (
  statusCode: number,
  bodyText: string,
): string => {
  let parsed: StructuredValue;

  try {
    parsed = parseStructuredJson(bodyText);
  } catch {
    return `HTTP ${statusCode}: ${bodyText.slice(0, ERROR_TEXT_EXCERPT_LENGTH)}`;
  }

  if (!isStructuredMap(parsed)) {
    return `HTTP ${statusCode}: `;
  }

  const detail = parsed.message ?? parsed.error ?? '';

  return `HTTP ${statusCode}: ${toMessageText(detail)}`;
};
