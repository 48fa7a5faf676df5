import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { VisitRecord } from './domain/entities/visit-record.entity';
import { IdentityArtifact } from './domain/ports/identity-detector.port';
import { ConfirmationDomainService } from './domain/services/confirmation.domain.service';
import { IdentityGateDomainService } from './domain/services/identity-gate.domain.service';
import { TokenAuthenticatorDomainService } from './domain/services/token-authenticator.domain.service';
import { TokenIssuerDomainService } from './domain/services/token-issuer.domain.service';
import { formatDuration, toIsoDuration } from './domain/utils/duration.util';
import { IdentitySubmissionResponseDto } from './dto/identity-submission-response.dto';
import { IssueVisitDto } from './dto/issue-visit.dto';
import { IssuedVisitResponseDto } from './dto/issued-visit-response.dto';
import { VisitResponseDto } from './dto/visit-response.dto';

/**
 * VisitsService (application layer)
 *
 * Thin facade over the visit domain services: maps DTOs in and out and
 * builds redemption URLs. All lifecycle rules live in the domain services.
 */
@Injectable()
export class VisitsService {
  constructor(
    private readonly issuer: TokenIssuerDomainService,
    private readonly authenticator: TokenAuthenticatorDomainService,
    private readonly identityGate: IdentityGateDomainService,
    private readonly confirmation: ConfirmationDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async issueVisit(
    dto: IssueVisitDto,
    principalId: string,
  ): Promise<IssuedVisitResponseDto> {
    const record = await this.issuer.issueToken(
      {
        visitorName: dto.visitorName,
        hostName: dto.hostName,
        location: dto.location,
        purpose: dto.purpose,
        duration: dto.duration,
      },
      principalId,
    );

    return {
      token: record.token,
      signature: record.signature,
      redemptionUrl: this.buildRedemptionUrl(record),
      visit: this.toResponseDto(record),
    };
  }

  async getVisit(token: string, signature?: string): Promise<VisitResponseDto> {
    const record = await this.authenticator.authenticate(token, signature);
    return this.toResponseDto(record);
  }

  async submitIdentity(
    token: string,
    artifact: IdentityArtifact,
    signature?: string,
  ): Promise<IdentitySubmissionResponseDto> {
    const result = await this.identityGate.submitIdentityArtifact(
      token,
      artifact,
      signature,
    );

    if (result.status === 'rejected') {
      return {
        status: result.status,
        reason: result.reason,
        visit: this.toResponseDto(result.visit),
      };
    }
    return { status: result.status, visit: this.toResponseDto(result.visit) };
  }

  async confirmEntry(
    token: string,
    principalId: string,
    signature?: string,
  ): Promise<VisitResponseDto> {
    const record = await this.confirmation.confirmEntry(
      token,
      principalId,
      signature,
    );
    return this.toResponseDto(record);
  }

  buildRedemptionUrl(record: VisitRecord): string {
    const publicUrl = this.configService.getOrThrow('app.publicUrl', {
      infer: true,
    });
    const apiPrefix = this.configService.getOrThrow('app.apiPrefix', {
      infer: true,
    });

    const url = `${publicUrl}/${apiPrefix}/v1/visits/${encodeURIComponent(record.token)}`;
    return record.signature
      ? `${url}?signature=${encodeURIComponent(record.signature)}`
      : url;
  }

  toResponseDto(record: VisitRecord): VisitResponseDto {
    const status = this.confirmation.describeStatus(record);

    return {
      visitorName: record.visitorName,
      hostName: record.hostName,
      location: record.location,
      purpose: record.purpose,
      requestedDuration: toIsoDuration(record.requestedDurationMs),
      issuedAt: record.issuedAt,
      dailyExpiry: record.dailyExpiry,
      stage: status.stage,
      identityVerified: record.identityVerified,
      confirmedAt: record.confirmedAt,
      tokenExpired: status.tokenExpired,
      stayExpired: status.stayExpired,
      remainingStayMs: status.remainingStayMs,
      remainingStay:
        status.remainingStayMs === null
          ? null
          : formatDuration(status.remainingStayMs),
    };
  }
}
