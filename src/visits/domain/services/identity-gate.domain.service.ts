import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditService, VisitEventType } from '../../../audit/audit.service';
import { AllConfigType } from '../../../config/config.type';
import { VisitRecord } from '../entities/visit-record.entity';
import {
  DetectorUnavailableError,
  InvalidIdentityArtifactError,
} from '../errors/visit.errors';
import { Clock } from '../ports/clock.port';
import {
  Detection,
  IdentityArtifact,
  IdentityDetectorPort,
} from '../ports/identity-detector.port';
import { VisitRepositoryPort } from '../ports/visit.repository.port';
import { retryOnConflict } from '../utils/conflict-retry.util';
import {
  IdentityRejectionReason,
  evaluateDetections,
} from '../utils/identity-verdict.util';
import { TokenAuthenticatorDomainService } from './token-authenticator.domain.service';

const ACCEPTED_MIME_TYPES = ['image/jpeg', 'image/png'];
const MAX_FILE_NAME_LENGTH = 255;

export type IdentitySubmissionResult =
  | { status: 'accepted'; visit: VisitRecord }
  | { status: 'rejected'; reason: IdentityRejectionReason; visit: VisitRecord };

/**
 * IdentityGateDomainService
 *
 * Runs an uploaded ID image through the detector and, on acceptance, marks
 * the visit as identity-verified. A rejection leaves the record untouched
 * and is returned as a result, not thrown; the visitor may try again.
 */
@Injectable()
export class IdentityGateDomainService {
  private readonly logger = new Logger(IdentityGateDomainService.name);
  private readonly labels: string[];
  private readonly threshold: number;
  private readonly maxArtifactBytes: number;
  private readonly updateMaxAttempts: number;

  constructor(
    private readonly repository: VisitRepositoryPort,
    private readonly detector: IdentityDetectorPort,
    private readonly authenticator: TokenAuthenticatorDomainService,
    private readonly clock: Clock,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.labels = configService.getOrThrow('visits.identity.labels', {
      infer: true,
    });
    this.threshold = configService.getOrThrow(
      'visits.identity.confidenceThreshold',
      { infer: true },
    );
    this.maxArtifactBytes = configService.getOrThrow(
      'visits.identity.maxArtifactBytes',
      { infer: true },
    );
    this.updateMaxAttempts = configService.getOrThrow(
      'visits.store.updateMaxAttempts',
      { infer: true },
    );
  }

  /**
   * @throws VisitNotFoundError, VisitSignatureInvalidError,
   *   VisitTokenExpiredError from authentication
   * @throws InvalidIdentityArtifactError for an empty, oversized or non-image upload
   * @throws DetectorUnavailableError when the detector cannot give an answer
   */
  async submitIdentityArtifact(
    token: string,
    artifact: IdentityArtifact,
    signature?: string,
  ): Promise<IdentitySubmissionResult> {
    const visit = await this.authenticator.authenticate(token, signature);

    // Already verified: keep the first accepted artifact
    if (visit.identityVerified) {
      return { status: 'accepted', visit };
    }

    this.assertArtifact(artifact);

    const detections = await this.runDetector(token, artifact);
    const verdict = evaluateDetections(detections, this.labels, this.threshold);

    if (!verdict.accepted) {
      this.auditService.logVisitEvent({
        event: VisitEventType.IDENTITY_REJECTED,
        success: false,
        token,
        metadata: {
          reason: verdict.reason,
          bestConfidence: verdict.bestConfidence,
        },
      });
      return { status: 'rejected', reason: verdict.reason, visit };
    }

    const fileName = this.artifactReference(artifact.fileName);
    try {
      const updated = await retryOnConflict(
        () =>
          this.repository.update(token, (current) => {
            this.authenticator.assertUsable(
              current,
              signature,
              this.clock.now(),
            );
            if (current.identityVerified) {
              return current;
            }
            return {
              ...current,
              identityVerified: true,
              identityArtifact: fileName,
            };
          }),
        this.updateMaxAttempts,
      );

      this.auditService.logVisitEvent({
        event: VisitEventType.IDENTITY_ACCEPTED,
        success: true,
        token,
        metadata: { label: verdict.label, confidence: verdict.confidence },
      });
      return { status: 'accepted', visit: updated };
    } catch (error) {
      this.authenticator.recordFailure(token, error);
      throw error;
    }
  }

  private assertArtifact(artifact: IdentityArtifact): void {
    if (artifact.content.length === 0) {
      throw new InvalidIdentityArtifactError('Identity artifact is empty');
    }
    if (artifact.content.length > this.maxArtifactBytes) {
      throw new InvalidIdentityArtifactError(
        `Identity artifact exceeds ${this.maxArtifactBytes} bytes`,
      );
    }
    if (!ACCEPTED_MIME_TYPES.includes(artifact.mimeType)) {
      throw new InvalidIdentityArtifactError(
        `Unsupported identity artifact type: ${artifact.mimeType}`,
      );
    }
  }

  private async runDetector(
    token: string,
    artifact: IdentityArtifact,
  ): Promise<Detection[]> {
    try {
      return await this.detector.detect(artifact);
    } catch (error) {
      const unavailable =
        error instanceof DetectorUnavailableError
          ? error
          : new DetectorUnavailableError(
              error instanceof Error ? error.message : 'Unknown error',
            );
      this.logger.warn(unavailable.message);
      this.auditService.logVisitEvent({
        event: VisitEventType.DETECTOR_UNAVAILABLE,
        success: false,
        token,
        errorMessage: unavailable.message,
      });
      throw unavailable;
    }
  }

  /**
   * Base name only, so client paths never reach the store.
   */
  private artifactReference(fileName: string): string {
    const baseName = fileName.split(/[\\/]/).pop() || 'artifact';
    return baseName.substring(0, MAX_FILE_NAME_LENGTH);
  }
}
