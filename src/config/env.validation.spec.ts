import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should fill every default from an empty environment', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3000,
      CORS_ORIGIN: 'http://localhost:5173',
      BALANCE_STORE: 'file',
      BALANCE_DATA_DIR: './data',
      PRICE_API_URL: 'https://api.coingecko.com/api/v3/simple/price',
      PRICE_ASSET_ID: 'wrapped-quil',
      PRICE_TIMEOUT_MS: 5000,
      PRICE_RETRIES: 1,
    });
  });

  it('should coerce numeric variables from strings', () => {
    const env = validateEnv({
      PORT: '8080',
      PRICE_TIMEOUT_MS: '1500',
      PRICE_RETRIES: '0',
    });

    expect(env.PORT).toBe(8080);
    expect(env.PRICE_TIMEOUT_MS).toBe(1500);
    expect(env.PRICE_RETRIES).toBe(0);
  });

  it('should accept the in-memory store', () => {
    expect(validateEnv({ BALANCE_STORE: 'memory' }).BALANCE_STORE).toBe('memory');
  });

  it('should reject an unknown store kind', () => {
    expect(() => validateEnv({ BALANCE_STORE: 'redis' })).toThrow(
      /^Invalid environment configuration: BALANCE_STORE: /,
    );
  });

  it('should list every offending variable', () => {
    expect(() =>
      validateEnv({ PORT: 'eighty', PRICE_API_URL: 'not a url' }),
    ).toThrow(/PORT: .*; PRICE_API_URL: /);
  });

  it('should cap the number of price retries', () => {
    expect(() => validateEnv({ PRICE_RETRIES: '10' })).toThrow(/PRICE_RETRIES/);
  });
});
