import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditService, VisitEventType } from '../../../audit/audit.service';
import { AllConfigType } from '../../../config/config.type';
import { PrincipalAuthorizerPort } from '../../../roles/domain/ports/principal-authorizer.port';
import { RoleEnum } from '../../../roles/roles.enum';
import { VisitRecord } from '../entities/visit-record.entity';
import {
  InvalidVisitDetailsError,
  VisitIssuanceError,
  VisitUpdateConflictError,
} from '../errors/visit.errors';
import { Clock } from '../ports/clock.port';
import { TOKEN_SIGNER, TokenSigner } from '../ports/token-signer.port';
import { VisitRepositoryPort } from '../ports/visit.repository.port';
import { parseDuration } from '../utils/duration.util';
import { buildSigningPayload } from '../utils/signing-payload.util';
import { assertPrincipalRole } from '../utils/principal-policy.util';
import { endOfDay } from '../utils/time-window.util';
import { VisitTokenGenerator } from './visit-token.generator';

export interface VisitDetails {
  visitorName: string;
  hostName: string;
  location: string;
  purpose: string;
  duration: string; // free text, see parseDuration
}

const REQUIRED_DETAILS = [
  'visitorName',
  'hostName',
  'location',
  'purpose',
] as const;

/**
 * TokenIssuerDomainService
 *
 * Creates a visit record for a host and hands back its token. The token is
 * valid until the end of the local day it was issued on.
 */
@Injectable()
export class TokenIssuerDomainService {
  private readonly logger = new Logger(TokenIssuerDomainService.name);
  private readonly issueMaxAttempts: number;

  constructor(
    private readonly repository: VisitRepositoryPort,
    private readonly tokenGenerator: VisitTokenGenerator,
    @Inject(TOKEN_SIGNER)
    private readonly signer: TokenSigner | null,
    private readonly clock: Clock,
    private readonly authorizer: PrincipalAuthorizerPort,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.issueMaxAttempts = configService.getOrThrow(
      'visits.token.issueMaxAttempts',
      { infer: true },
    );
  }

  /**
   * @throws PrincipalNotAuthorizedError when the issuer is not a host
   * @throws InvalidVisitDetailsError when a required detail is blank
   * @throws VisitIssuanceError when no unused token was found
   */
  async issueToken(
    details: VisitDetails,
    issuerPrincipal: string,
  ): Promise<VisitRecord> {
    await assertPrincipalRole(
      this.authorizer,
      this.auditService,
      issuerPrincipal,
      RoleEnum.host,
    );

    const trimmed = {
      visitorName: details.visitorName.trim(),
      hostName: details.hostName.trim(),
      location: details.location.trim(),
      purpose: details.purpose.trim(),
    };
    const blank = REQUIRED_DETAILS.filter((field) => !trimmed[field]);
    if (blank.length > 0) {
      throw new InvalidVisitDetailsError(blank);
    }

    const issuedAt = this.clock.now();
    const requestedDurationMs = parseDuration(details.duration);

    for (let attempt = 1; attempt <= this.issueMaxAttempts; attempt++) {
      const draft: VisitRecord = {
        token: this.tokenGenerator.generate(),
        signature: null,
        ...trimmed,
        requestedDurationMs,
        issuedAt,
        dailyExpiry: endOfDay(issuedAt),
        identityVerified: false,
        identityArtifact: null,
        confirmedAt: null,
        issuedBy: issuerPrincipal,
        confirmedBy: null,
      };
      const record = this.signer
        ? { ...draft, signature: this.signer.sign(buildSigningPayload(draft)) }
        : draft;

      try {
        const created = await this.repository.create(record);
        this.auditService.logVisitEvent({
          event: VisitEventType.VISIT_ISSUED,
          success: true,
          token: created.token,
          principalId: issuerPrincipal,
          metadata: {
            signed: created.signature !== null,
            requestedDurationMs,
          },
        });
        return created;
      } catch (error) {
        if (!(error instanceof VisitUpdateConflictError)) {
          throw error;
        }
        this.logger.warn(
          `Visit token collision on attempt ${attempt}/${this.issueMaxAttempts}`,
        );
      }
    }

    this.auditService.logVisitEvent({
      event: VisitEventType.VISIT_ISSUE_FAILED,
      success: false,
      principalId: issuerPrincipal,
      metadata: { attempts: this.issueMaxAttempts },
    });
    throw new VisitIssuanceError(this.issueMaxAttempts);
  }
}
