export type SigningAlgorithm = 'hmac-sha256' | 'rsa-sha256';

/**
 * Signs and verifies the canonical visit payload.
 *
 * One signer is chosen per deployment; keys are read-only after startup and
 * shared by all callers.
 */
export interface TokenSigner {
  readonly algorithm: SigningAlgorithm;
  sign(payload: string): string; // base64url
  verify(payload: string, signature: string): boolean;
}

export const TOKEN_SIGNER = 'TokenSigner';
