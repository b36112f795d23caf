import Papa from 'papaparse';

import {
  ResponseCodecException,
  ResponseCodecExceptionCode,
} from 'src/engine/core-modules/response-codec/response-codec.exception';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isListOfMaps,
  isStructuredMap,
  isStructuredScalar,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const toCell = (value: StructuredValue): string => {
  if (value === null) {
    return '';
  }

  return isStructuredScalar(value) ? String(value) : JSON.stringify(value);
};

const hasSameFields = (record: StructuredMap, fields: string[]): boolean => {
  const keys = Object.keys(record);

  return (
    keys.length === fields.length &&
    fields.every((field) => Object.hasOwn(record, field))
  );
};

const toRecords = (value: StructuredValue): StructuredMap[] => {
  if (isStructuredMap(value)) {
    return [value];
  }

  if (isListOfMaps(value) && value.length > 0) {
    return value;
  }

  throw new ResponseCodecException(
    'CSV output requires an object or a non-empty list of objects',
    ResponseCodecExceptionCode.CSV_UNSUPPORTED_SHAPE,
  );
};

export const structuredValueToCsv = (value: StructuredValue): string => {
  const records = toRecords(value);
  const fields = Object.keys(records[0]);

  const mismatchIndex = records.findIndex(
    (record) => !hasSameFields(record, fields),
  );

  if (mismatchIndex !== -1) {
    throw new ResponseCodecException(
      `Record ${mismatchIndex} does not have the fields ${fields.join(', ')}`,
      ResponseCodecExceptionCode.CSV_HETEROGENEOUS_RECORDS,
      { details: { recordIndex: mismatchIndex, fields } },
    );
  }

  return Papa.unparse({
    fields,
    data: records.map((record) => fields.map((field) => toCell(record[field]))),
  });
};
