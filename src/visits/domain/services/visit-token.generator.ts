import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { AllConfigType } from '../../../config/config.type';

/**
 * Unguessable, URL-safe visit tokens from the OS CSPRNG.
 */
@Injectable()
export class VisitTokenGenerator {
  private readonly bytes: number;

  constructor(configService: ConfigService<AllConfigType>) {
    this.bytes = configService.getOrThrow('visits.token.bytes', {
      infer: true,
    });
  }

  generate(): string {
    return randomBytes(this.bytes).toString('base64url');
  }
}
