import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { AllConfigType } from '../config/config.type';

export enum VisitEventType {
  VISIT_ISSUED = 'VISIT_ISSUED',
  VISIT_ISSUE_FAILED = 'VISIT_ISSUE_FAILED',
  UNKNOWN_TOKEN = 'UNKNOWN_TOKEN',
  SIGNATURE_INVALID = 'SIGNATURE_INVALID',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  IDENTITY_ACCEPTED = 'IDENTITY_ACCEPTED',
  IDENTITY_REJECTED = 'IDENTITY_REJECTED',
  DETECTOR_UNAVAILABLE = 'DETECTOR_UNAVAILABLE',
  ENTRY_CONFIRMED = 'ENTRY_CONFIRMED',
  ENTRY_NOT_VERIFIED = 'ENTRY_NOT_VERIFIED',
  DUPLICATE_CONFIRMATION = 'DUPLICATE_CONFIRMATION',
  UPDATE_CONFLICT = 'UPDATE_CONFLICT',
  UNAUTHORIZED_PRINCIPAL = 'UNAUTHORIZED_PRINCIPAL',
}

export interface VisitEventData {
  event: VisitEventType;
  success: boolean;
  token?: string; // hashed before logging
  principalId?: string;
  errorMessage?: string;
  metadata?: Record<string, string | number | boolean | null>;
}

/**
 * Audit log for the visit lifecycle.
 *
 * One JSON line per event on stdout, for the log collector to pick up.
 *
 * Never logged:
 * - raw tokens or signatures (a token is referenced by its fingerprint)
 * - visitor names or other free-text visit details
 * - identity image bytes
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logVisitEvent(data: VisitEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: 'visit-authorization-api',
      component: 'visits',
      event: data.event,
      success: data.success,
      tokenFingerprint: data.token
        ? AuditService.fingerprint(data.token)
        : undefined,
      principalId: data.principalId,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    console.info(JSON.stringify(logEntry));
  }

  /**
   * Short, stable reference to a token that cannot be replayed.
   */
  static fingerprint(token: string): string {
    return createHash('sha256').update(token).digest('hex').substring(0, 12);
  }

  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/token[:=\s]+[^\s]+/gi, 'token: [REDACTED]')
      .replace(/signature[:=\s]+[^\s]+/gi, 'signature: [REDACTED]')
      .substring(0, 500);
  }
}
