import { generateKeyPairSync } from 'crypto';
import { createTestConfigService } from '../../../../test/utils/test-config';
import { HmacTokenSigner } from './hmac-token-signer';
import { RsaTokenSigner } from './rsa-token-signer';
import { createTokenSigner } from './token-signer.factory';

const PAYLOAD = '["token-abc","Ada Lovelace"]';

describe('HmacTokenSigner', () => {
  const signer = new HmacTokenSigner('test-secret');

  it('verifies its own signatures', () => {
    const signature = signer.sign(PAYLOAD);
    expect(signature).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(signer.verify(PAYLOAD, signature)).toBe(true);
  });

  it('rejects a changed payload or another secret', () => {
    const signature = signer.sign(PAYLOAD);
    expect(signer.verify(`${PAYLOAD} `, signature)).toBe(false);
    expect(new HmacTokenSigner('other-secret').verify(PAYLOAD, signature)).toBe(
      false,
    );
  });

  it('rejects a malformed signature', () => {
    expect(signer.verify(PAYLOAD, 'short')).toBe(false);
  });

  it('requires a secret', () => {
    expect(() => new HmacTokenSigner('')).toThrow(
      'HMAC signing secret must not be empty',
    );
  });
});

describe('RsaTokenSigner', () => {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });

  it('verifies signatures made with the private key', () => {
    const signer = new RsaTokenSigner({ privateKeyPem: privateKey });
    const signature = signer.sign(PAYLOAD);
    expect(signer.verify(PAYLOAD, signature)).toBe(true);
    expect(signer.verify(`${PAYLOAD} `, signature)).toBe(false);
  });

  it('verifies with only the public key', () => {
    const signature = new RsaTokenSigner({ privateKeyPem: privateKey }).sign(
      PAYLOAD,
    );
    const verifier = new RsaTokenSigner({ publicKeyPem: publicKey });

    expect(verifier.verify(PAYLOAD, signature)).toBe(true);
    expect(() => verifier.sign(PAYLOAD)).toThrow(
      'RSA signer has no private key configured',
    );
  });

  it('treats garbage as a failed verification', () => {
    const signer = new RsaTokenSigner({ publicKeyPem: publicKey });
    expect(signer.verify(PAYLOAD, 'not-a-signature')).toBe(false);
  });

  it('needs at least one key', () => {
    expect(() => new RsaTokenSigner({})).toThrow(
      'RSA signing needs a private or a public key',
    );
  });
});

describe('createTokenSigner', () => {
  it('returns null when signing is off', () => {
    expect(createTokenSigner(createTestConfigService())).toBeNull();
  });

  it('builds an HMAC signer', () => {
    const signer = createTokenSigner(
      createTestConfigService({
        signing: { algorithm: 'hmac-sha256', secret: 'test-secret' },
      }),
    );
    expect(signer?.algorithm).toBe('hmac-sha256');
  });

  it('builds a verify-only RSA signer from a public key', () => {
    const { publicKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });
    const signer = createTokenSigner(
      createTestConfigService({
        signing: { algorithm: 'rsa-sha256', publicKey },
      }),
    );

    expect(signer?.algorithm).toBe('rsa-sha256');
    expect(() => signer?.sign(PAYLOAD)).toThrow(
      'RSA signer has no private key configured',
    );
  });

  it('refuses HMAC without a secret', () => {
    expect(() =>
      createTokenSigner(
        createTestConfigService({ signing: { algorithm: 'hmac-sha256' } }),
      ),
    ).toThrow('VISIT_SIGNING_SECRET is required for hmac-sha256');
  });
});
