import { ConfigService } from './config.service';

describe('ConfigService', () => {
  const env = {
    NODE_ENV: 'test-nonexistent',
    PORT: '4100',
    JWT_SECRET: 'test-secret',
    DB_SYNCHRONIZE: 'TRUE',
    BROKEN_PORT: 'abc',
  };

  let config: ConfigService;

  beforeEach(() => {
    config = new ConfigService(env);
  });

  it('returns values exported in the environment', () => {
    expect(config.get('JWT_SECRET')).toBe('test-secret');
  });

  it('throws for a missing required key', () => {
    expect(() => config.get('DB_HOST')).toThrow(
      'Configuration error: Missing required environment variable DB_HOST',
    );
  });

  it('falls back for optional keys', () => {
    expect(config.getOrDefault('JWT_EXPIRES_IN', '60m')).toBe('60m');
    expect(config.getNumber('PORT', 5000)).toBe(4100);
    expect(config.getNumber('BROKEN_PORT', 5000)).toBe(5000);
    expect(config.getBoolean('DB_SYNCHRONIZE', false)).toBe(true);
    expect(config.getBoolean('MISSING_FLAG', false)).toBe(false);
  });

  it('is not production outside NODE_ENV=production', () => {
    expect(config.isProduction).toBe(false);
  });
});
