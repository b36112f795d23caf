import { assertUnreachable } from 'api-bridge-shared/utils';

import {
  ResponseCodecException,
  ResponseCodecExceptionCode,
} from 'src/engine/core-modules/response-codec/response-codec.exception';
import {
  type EncodeResult,
  type EncodedOutput,
} from 'src/engine/core-modules/response-codec/types/encode-result.type';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
} from 'src/engine/core-modules/response-codec/types/output-format.type';
import { type StructuredValue } from 'src/engine/core-modules/response-codec/types/structured-value.type';
import { structuredValueToCsv } from 'src/engine/core-modules/response-codec/utils/structured-value-to-csv.util';
import {
  structuredValueToList,
  structuredValueToTabular,
} from 'src/engine/core-modules/response-codec/utils/structured-value-to-tabular.util';
import { structuredValueToXml } from 'src/engine/core-modules/response-codec/utils/structured-value-to-xml.util';

const encodeAs = (
  value: StructuredValue,
  format: OutputFormat,
): EncodedOutput => {
  switch (format) {
    case 'json':
      return JSON.stringify(value, null, 2);
    case 'csv':
      return structuredValueToCsv(value);
    case 'xml':
      return structuredValueToXml(value);
    case 'tabular':
      return structuredValueToTabular(value);
    case 'list':
      return structuredValueToList(value);
    default:
      return assertUnreachable(format);
  }
};

export const encodeStructuredValue = (
  value: StructuredValue,
  format: string,
): EncodeResult => {
  const normalizedFormat = format.toLowerCase();

  if (!isOutputFormat(normalizedFormat)) {
    return {
      success: false,
      error: new ResponseCodecException(
        `Unsupported output format "${format}", expected one of ${OUTPUT_FORMATS.join(', ')}`,
        ResponseCodecExceptionCode.UNSUPPORTED_OUTPUT_FORMAT,
      ),
    };
  }

  try {
    return {
      success: true,
      format: normalizedFormat,
      output: encodeAs(value, normalizedFormat),
    };
  } catch (error) {
    if (error instanceof ResponseCodecException) {
      return { success: false, error };
    }

    throw error;
  }
};
