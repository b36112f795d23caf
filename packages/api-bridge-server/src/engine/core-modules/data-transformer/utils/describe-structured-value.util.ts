import { type DataDescription } from 'src/engine/core-modules/data-transformer/types/data-preview.type';
import { getStructuredTypeName } from 'src/engine/core-modules/data-transformer/utils/get-structured-type-name.util';
import {
  type StructuredMap,
  type StructuredValue,
} from 'src/engine/core-modules/response-codec/types/structured-value.type';
import {
  isStructuredList,
  isStructuredMap,
} from 'src/engine/core-modules/response-codec/utils/structured-value-guards.util';

const describeFields = (
  record: StructuredMap,
): DataDescription['structure'] => ({
  fields: Object.keys(record),
  fieldTypes: Object.fromEntries(
    Object.entries(record).map(([key, entry]) => [
      key,
      getStructuredTypeName(entry),
    ]),
  ),
});

// Lists are described by their first record, which is assumed to be
// representative.
export const describeStructuredValue = (
  value: StructuredValue,
): DataDescription => {
  if (isStructuredList(value)) {
    const [first] = value;

    return {
      type: 'list',
      size: value.length,
      structure:
        first !== undefined && isStructuredMap(first)
          ? describeFields(first)
          : null,
      sample:
        value.length === 0
          ? null
          : value.length === 1
            ? first
            : value.slice(0, 2),
    };
  }

  if (isStructuredMap(value)) {
    return {
      type: 'map',
      size: Object.keys(value).length,
      structure: describeFields(value),
      sample: value,
    };
  }

  return {
    type: getStructuredTypeName(value),
    size: 1,
    structure: null,
    sample: value,
  };
};
