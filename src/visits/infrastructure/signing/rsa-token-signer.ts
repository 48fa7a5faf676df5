import { KeyObject, createPrivateKey, createPublicKey, sign, verify } from 'crypto';
import { TokenSigner } from '../../domain/ports/token-signer.port';

/**
 * RSASSA-PKCS1-v1_5 over SHA-256.
 *
 * The private key is optional so that verifier-only replicas (guard
 * devices) can run with just the public key.
 */
export class RsaTokenSigner implements TokenSigner {
  readonly algorithm = 'rsa-sha256';
  private readonly privateKey: KeyObject | null;
  private readonly publicKey: KeyObject;

  constructor(keys: { privateKeyPem?: string; publicKeyPem?: string }) {
    this.privateKey = keys.privateKeyPem
      ? createPrivateKey(keys.privateKeyPem)
      : null;

    if (keys.publicKeyPem) {
      this.publicKey = createPublicKey(keys.publicKeyPem);
    } else if (this.privateKey) {
      this.publicKey = createPublicKey(this.privateKey);
    } else {
      throw new Error('RSA signing needs a private or a public key');
    }

    if (this.publicKey.asymmetricKeyType !== 'rsa') {
      throw new Error(
        `RSA signing needs an RSA key, got ${this.publicKey.asymmetricKeyType ?? 'unknown'}`,
      );
    }
  }

  sign(payload: string): string {
    if (!this.privateKey) {
      throw new Error('RSA signer has no private key configured');
    }
    return sign('sha256', Buffer.from(payload), this.privateKey).toString(
      'base64url',
    );
  }

  verify(payload: string, signature: string): boolean {
    try {
      return verify(
        'sha256',
        Buffer.from(payload),
        this.publicKey,
        Buffer.from(signature, 'base64url'),
      );
    } catch {
      // Malformed signature bytes are a failed verification, not an error
      return false;
    }
  }
}
