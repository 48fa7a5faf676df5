import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditService, VisitEventType } from '../../../audit/audit.service';
import { AllConfigType } from '../../../config/config.type';
import { PrincipalAuthorizerPort } from '../../../roles/domain/ports/principal-authorizer.port';
import { RoleEnum } from '../../../roles/roles.enum';
import { VisitRecord } from '../entities/visit-record.entity';
import {
  VisitAlreadyConfirmedError,
  VisitNotVerifiedError,
} from '../errors/visit.errors';
import { Clock } from '../ports/clock.port';
import { VisitRepositoryPort } from '../ports/visit.repository.port';
import { retryOnConflict } from '../utils/conflict-retry.util';
import { assertPrincipalRole } from '../utils/principal-policy.util';
import {
  VisitStateMachine,
  VisitStatus,
} from '../utils/visit-state-machine.util';
import { TokenAuthenticatorDomainService } from './token-authenticator.domain.service';

/**
 * ConfirmationDomainService
 *
 * Security staff confirm physical entry exactly once per visit. The stay
 * countdown starts at confirmation.
 */
@Injectable()
export class ConfirmationDomainService {
  private readonly identityRequired: boolean;
  private readonly updateMaxAttempts: number;

  constructor(
    private readonly repository: VisitRepositoryPort,
    private readonly authenticator: TokenAuthenticatorDomainService,
    private readonly authorizer: PrincipalAuthorizerPort,
    private readonly clock: Clock,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.identityRequired = configService.getOrThrow(
      'visits.identity.required',
      { infer: true },
    );
    this.updateMaxAttempts = configService.getOrThrow(
      'visits.store.updateMaxAttempts',
      { infer: true },
    );
  }

  /**
   * Of any number of concurrent calls for one token, exactly one succeeds;
   * the rest see ALREADY_CONFIRMED.
   *
   * @throws PrincipalNotAuthorizedError when the confirmer is not security
   * @throws VisitNotFoundError, VisitSignatureInvalidError,
   *   VisitTokenExpiredError, VisitNotVerifiedError, VisitAlreadyConfirmedError
   * @throws VisitUpdateConflictError when retries are exhausted
   */
  async confirmEntry(
    token: string,
    confirmerPrincipal: string,
    signature?: string,
  ): Promise<VisitRecord> {
    await assertPrincipalRole(
      this.authorizer,
      this.auditService,
      confirmerPrincipal,
      RoleEnum.security,
    );

    try {
      const confirmed = await retryOnConflict(
        () =>
          this.repository.update(token, (current) => {
            const now = this.clock.now();
            this.authenticator.assertUsable(current, signature, now);

            if (this.identityRequired && !current.identityVerified) {
              throw new VisitNotVerifiedError();
            }
            if (current.confirmedAt) {
              throw new VisitAlreadyConfirmedError(current.confirmedAt);
            }

            return {
              ...current,
              confirmedAt: now,
              confirmedBy: confirmerPrincipal,
            };
          }),
        this.updateMaxAttempts,
      );

      this.auditService.logVisitEvent({
        event: VisitEventType.ENTRY_CONFIRMED,
        success: true,
        token,
        principalId: confirmerPrincipal,
        metadata: { requestedDurationMs: confirmed.requestedDurationMs },
      });
      return confirmed;
    } catch (error) {
      this.authenticator.recordFailure(token, error, confirmerPrincipal);
      throw error;
    }
  }

  /**
   * Null until entry is confirmed; zero once the stay has run out.
   */
  remainingStayTime(record: VisitRecord): number | null {
    return VisitStateMachine.remainingStayMs(record, this.clock.now());
  }

  describeStatus(record: VisitRecord): VisitStatus {
    return VisitStateMachine.describe(
      record,
      this.clock.now(),
      this.identityRequired,
    );
  }
}
