import { createHash } from 'crypto';

import { buildSessionFileName } from 'src/engine/core-modules/api-data-storage/utils/build-session-file-name.util';
import { computeContentHash } from 'src/engine/core-modules/api-data-storage/utils/compute-content-hash.util';

describe('buildSessionFileName', () => {
  it('should join api, endpoint, local time and the session id prefix', () => {
    expect(
      buildSessionFileName(
        'weather',
        'current',
        new Date(2024, 2, 5, 14, 30, 15),
        '0f8e2c1a-1111-4222-8333-444455556666',
      ),
    ).toBe('weather_current_20240305_143015_0f8e2c1a.db');
  });

  it('should replace characters that are unsafe in file names', () => {
    expect(
      buildSessionFileName(
        'my api',
        '../users',
        new Date(2024, 0, 1, 0, 0, 0),
        'abcdef0123',
      ),
    ).toBe('my-api_..-users_20240101_000000_abcdef01.db');
  });
});

describe('computeContentHash', () => {
  it('should hash the canonical form so key order does not matter', () => {
    const expected = createHash('sha256')
      .update('{"a":2,"b":{"c":1,"d":[1,"x"]}}')
      .digest('hex');

    expect(computeContentHash({ b: { d: [1, 'x'], c: 1 }, a: 2 })).toBe(
      expected,
    );
    expect(computeContentHash({ a: 2, b: { c: 1, d: [1, 'x'] } })).toBe(
      expected,
    );
  });

  it('should distinguish list order', () => {
    expect(computeContentHash([1, 2])).not.toBe(computeContentHash([2, 1]));
  });
});
