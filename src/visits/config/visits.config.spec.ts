import visitsConfig from './visits.config';

describe('visits config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { NODE_ENV: 'test' };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('defaults to unsigned visits in memory', async () => {
    const config = await visitsConfig();

    expect(config.store).toEqual({ driver: 'memory', updateMaxAttempts: 3 });
    expect(config.signing.algorithm).toBe('none');
    expect(config.identity.required).toBe(true);
  });

  it('accepts rsa-sha256 with only a public key', async () => {
    process.env.VISIT_SIGNING_ALGORITHM = 'rsa-sha256';
    process.env.VISIT_SIGNING_PUBLIC_KEY = 'public-key-pem';

    const config = await visitsConfig();

    expect(config.signing).toMatchObject({
      algorithm: 'rsa-sha256',
      publicKey: 'public-key-pem',
      privateKey: undefined,
    });
  });

  it('accepts rsa-sha256 with only a private key', async () => {
    process.env.VISIT_SIGNING_ALGORITHM = 'rsa-sha256';
    process.env.VISIT_SIGNING_PRIVATE_KEY = 'private-key-pem';

    const config = await visitsConfig();

    expect(config.signing).toMatchObject({
      algorithm: 'rsa-sha256',
      privateKey: 'private-key-pem',
    });
  });

  it('refuses rsa-sha256 without any key', () => {
    process.env.VISIT_SIGNING_ALGORITHM = 'rsa-sha256';

    expect(() => visitsConfig()).toThrow('VISIT_SIGNING_PRIVATE_KEY');
  });

  it('refuses hmac-sha256 without a secret', () => {
    process.env.VISIT_SIGNING_ALGORITHM = 'hmac-sha256';

    expect(() => visitsConfig()).toThrow('VISIT_SIGNING_SECRET');
  });
});
