import { Inject, Injectable } from '@nestjs/common';
import { timingSafeEqual } from 'crypto';
import { AuditService, VisitEventType } from '../../../audit/audit.service';
import { VisitRecord } from '../entities/visit-record.entity';
import {
  VisitError,
  VisitErrorCode,
  VisitNotFoundError,
  VisitSignatureInvalidError,
  VisitTokenExpiredError,
} from '../errors/visit.errors';
import { Clock } from '../ports/clock.port';
import { TOKEN_SIGNER, TokenSigner } from '../ports/token-signer.port';
import { VisitRepositoryPort } from '../ports/visit.repository.port';
import { buildSigningPayload } from '../utils/signing-payload.util';
import { VisitStateMachine } from '../utils/visit-state-machine.util';

const AUDITED_FAILURES: Partial<Record<VisitErrorCode, VisitEventType>> = {
  [VisitErrorCode.UNKNOWN_TOKEN]: VisitEventType.UNKNOWN_TOKEN,
  [VisitErrorCode.SIGNATURE_INVALID]: VisitEventType.SIGNATURE_INVALID,
  [VisitErrorCode.TOKEN_EXPIRED]: VisitEventType.TOKEN_EXPIRED,
  [VisitErrorCode.NOT_VERIFIED]: VisitEventType.ENTRY_NOT_VERIFIED,
  [VisitErrorCode.ALREADY_CONFIRMED]: VisitEventType.DUPLICATE_CONFIRMATION,
  [VisitErrorCode.UPDATE_CONFLICT]: VisitEventType.UPDATE_CONFLICT,
};

function sameSignature(presented: string, stored: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(stored);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * TokenAuthenticatorDomainService
 *
 * Decides whether a presented token (and signature) may still be used.
 * Checks run in a fixed order: unknown token, signature, daily expiry.
 *
 * Read-only: authenticate() never writes, so UIs may poll it freely.
 * assertUsable() is the same check without the lookup, for callers that
 * already hold a freshly loaded record inside an atomic update.
 */
@Injectable()
export class TokenAuthenticatorDomainService {
  constructor(
    private readonly repository: VisitRepositoryPort,
    @Inject(TOKEN_SIGNER)
    private readonly signer: TokenSigner | null,
    private readonly clock: Clock,
    private readonly auditService: AuditService,
  ) {}

  /**
   * @throws VisitNotFoundError, VisitSignatureInvalidError, VisitTokenExpiredError
   */
  async authenticate(token: string, signature?: string): Promise<VisitRecord> {
    try {
      const record = await this.repository.findByToken(token);
      if (!record) {
        throw new VisitNotFoundError();
      }
      this.assertUsable(record, signature, this.clock.now());
      return record;
    } catch (error) {
      this.recordFailure(token, error);
      throw error;
    }
  }

  assertUsable(
    record: VisitRecord,
    presentedSignature: string | undefined,
    now: Date,
  ): void {
    this.assertSignature(record, presentedSignature);

    if (VisitStateMachine.isTokenExpired(record, now)) {
      throw new VisitTokenExpiredError(record.dailyExpiry);
    }
  }

  /**
   * Audit a failed lifecycle call. Security-relevant codes are always
   * written; anything else is left to the caller's own logging.
   */
  recordFailure(token: string, error: unknown, principalId?: string): void {
    if (!(error instanceof VisitError)) {
      return;
    }
    const event = AUDITED_FAILURES[error.code];
    if (!event) {
      return;
    }
    this.auditService.logVisitEvent({
      event,
      success: false,
      token,
      principalId,
      errorMessage: error.message,
    });
  }

  private assertSignature(
    record: VisitRecord,
    presentedSignature: string | undefined,
  ): void {
    // A store must not mix signed and unsigned records
    if (!this.signer) {
      if (record.signature) {
        throw new VisitSignatureInvalidError(
          'Signed visit found while signing is disabled',
        );
      }
      return;
    }

    if (!record.signature) {
      throw new VisitSignatureInvalidError(
        'Unsigned visit found while signing is enabled',
      );
    }

    if (
      !presentedSignature ||
      !sameSignature(presentedSignature, record.signature)
    ) {
      throw new VisitSignatureInvalidError();
    }

    // Catches edits to signed fields made behind the service's back
    if (!this.signer.verify(buildSigningPayload(record), record.signature)) {
      throw new VisitSignatureInvalidError(
        'Visit record does not match its signature',
      );
    }
  }
}
