import { buildHttpErrorMessage } from 'src/engine/core-modules/api-connector/utils/build-http-error-message.util';

describe('buildHttpErrorMessage', () => {
  it('should prefer the message field of a json body', () => {
    expect(
      buildHttpErrorMessage(404, '{"message":"Not found","error":"x"}'),
    ).toBe('HTTP 404: Not found');
  });

  it('should fall back to the error field', () => {
    expect(buildHttpErrorMessage(400, '{"error":"bad_request"}')).toBe(
      'HTTP 400: bad_request',
    );
  });

  it('should use the start of a text body', () => {
    expect(buildHttpErrorMessage(500, 'x'.repeat(250))).toBe(
      `HTTP 500: ${'x'.repeat(200)}`,
    );
  });
});
