import { createHmac, timingSafeEqual } from 'crypto';
import { TokenSigner } from '../../domain/ports/token-signer.port';

export class HmacTokenSigner implements TokenSigner {
  readonly algorithm = 'hmac-sha256';

  constructor(private readonly secret: string) {
    if (secret.length === 0) {
      throw new Error('HMAC signing secret must not be empty');
    }
  }

  sign(payload: string): string {
    return createHmac('sha256', this.secret)
      .update(payload)
      .digest('base64url');
  }

  verify(payload: string, signature: string): boolean {
    const expected = Buffer.from(this.sign(payload));
    const presented = Buffer.from(signature);
    return (
      expected.length === presented.length &&
      timingSafeEqual(expected, presented)
    );
  }
}
