import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should accept an empty environment', () => {
    expect(validateEnv({})).toEqual({});
  });

  it('should pass through unrelated variables untouched', () => {
    const env = { PORT: '8080', LOG_LEVEL: 'debug', HOME: '/root' };

    expect(validateEnv(env)).toBe(env);
  });

  it('should reject a port outside the TCP range', () => {
    expect(() => validateEnv({ PORT: '70000' })).toThrow(
      'Invalid environment configuration: PORT must not be greater than 65535',
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => validateEnv({ LOG_LEVEL: 'verbose' })).toThrow(
      /^Invalid environment configuration: LOG_LEVEL must be one of/,
    );
  });

  it('should reject a non-boolean synchronize flag', () => {
    expect(() => validateEnv({ DB_SYNCHRONIZE: 'yes' })).toThrow(
      /DB_SYNCHRONIZE/,
    );
  });
});
