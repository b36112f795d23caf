import { format } from 'date-fns';

const UNSAFE_FILE_NAME_CHARACTERS = /[^A-Za-z0-9._-]+/g;

const toFileNamePart = (value: string) =>
  value.replace(UNSAFE_FILE_NAME_CHARACTERS, '-');

// <api>_<endpoint>_<yyyyMMdd_HHmmss>_<first 8 characters of the session id>.db
export const buildSessionFileName = (
  apiName: string,
  endpointName: string,
  createdAt: Date,
  sessionId: string,
): string =>
  [
    toFileNamePart(apiName),
    toFileNamePart(endpointName),
    format(createdAt, 'yyyyMMdd_HHmmss'),
    sessionId.slice(0, 8),
  ].join('_') + '.db';
