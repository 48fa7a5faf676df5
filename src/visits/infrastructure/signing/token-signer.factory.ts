import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { TokenSigner } from '../../domain/ports/token-signer.port';
import { HmacTokenSigner } from './hmac-token-signer';
import { RsaTokenSigner } from './rsa-token-signer';

/**
 * Builds the deployment's signer once at startup. Null when signing is off.
 */
export function createTokenSigner(
  configService: ConfigService<AllConfigType>,
): TokenSigner | null {
  const logger = new Logger('TokenSignerFactory');
  const signing = configService.getOrThrow('visits.signing', { infer: true });

  switch (signing.algorithm) {
    case 'hmac-sha256':
      if (!signing.secret) {
        throw new Error('VISIT_SIGNING_SECRET is required for hmac-sha256');
      }
      logger.log('Visit tokens are signed with hmac-sha256');
      return new HmacTokenSigner(signing.secret);
    case 'rsa-sha256':
      if (signing.privateKey) {
        logger.log('Visit tokens are signed with rsa-sha256');
      } else {
        logger.warn(
          'Only VISIT_SIGNING_PUBLIC_KEY is set; visit signatures are verified but new visits cannot be issued',
        );
      }
      return new RsaTokenSigner({
        privateKeyPem: signing.privateKey,
        publicKeyPem: signing.publicKey,
      });
    case 'none':
      logger.warn('Visit token signing is disabled');
      return null;
  }
}
