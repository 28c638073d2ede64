import { redact } from './logging.interceptor';

describe('redact', () => {
  it('masks credentials at any depth', () => {
    expect(
      redact({
        username: 'ada',
        password: 'test-password',
        nested: [{ refresh_token: 'test-token', keep: 1 }],
      }),
    ).toEqual({
      username: 'ada',
      password: '[redacted]',
      nested: [{ refresh_token: '[redacted]', keep: 1 }],
    });
  });

  it('leaves scalars and dates alone', () => {
    const when = new Date('2026-01-01T00:00:00Z');
    expect(redact('plain')).toBe('plain');
    expect(redact(when)).toBe(when);
    expect(redact(null)).toBeNull();
  });
});
