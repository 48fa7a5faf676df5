import { VisitRecord } from '../entities/visit-record.entity';
import { VisitStage } from '../enums/visit-stage.enum';
import { InvalidVisitTransitionError } from '../errors/visit.errors';
import { isPast } from './time-window.util';

export interface VisitStatus {
  stage: VisitStage;
  tokenExpired: boolean;
  stayExpired: boolean;
  remainingStayMs: number | null;
}

const IMMUTABLE_FIELDS = [
  'token',
  'signature',
  'visitorName',
  'hostName',
  'location',
  'purpose',
  'requestedDurationMs',
  'issuedBy',
] as const;

const IMMUTABLE_INSTANTS = ['issuedAt', 'dailyExpiry'] as const;

/**
 * Visit State Machine
 *
 * Entry axis:
 * - IDENTITY_PENDING → AWAITING_CONFIRMATION (identity gate accepts, or the
 *   gate is disabled)
 * - AWAITING_CONFIRMATION → CONFIRMED (confirmEntry, exactly once)
 *
 * Two expiry clocks, independent of the entry axis and of each other:
 * - token expiry: now > dailyExpiry, blocks every further use of the token
 * - stay expiry: now > confirmedAt + requestedDuration, informational only
 */
export class VisitStateMachine {
  /**
   * Reject any write that changes a fixed field or moves a flag backwards.
   *
   * @throws InvalidVisitTransitionError naming the first offending field
   */
  static assertMonotonicTransition(
    before: VisitRecord,
    after: VisitRecord,
  ): void {
    for (const field of IMMUTABLE_FIELDS) {
      if (before[field] !== after[field]) {
        throw new InvalidVisitTransitionError(field);
      }
    }

    for (const field of IMMUTABLE_INSTANTS) {
      if (before[field].getTime() !== after[field].getTime()) {
        throw new InvalidVisitTransitionError(field);
      }
    }

    if (before.identityVerified && !after.identityVerified) {
      throw new InvalidVisitTransitionError('identityVerified');
    }
    if (
      before.identityVerified &&
      before.identityArtifact !== after.identityArtifact
    ) {
      throw new InvalidVisitTransitionError('identityArtifact');
    }

    if (before.confirmedAt) {
      if (
        !after.confirmedAt ||
        after.confirmedAt.getTime() !== before.confirmedAt.getTime()
      ) {
        throw new InvalidVisitTransitionError('confirmedAt');
      }
      if (after.confirmedBy !== before.confirmedBy) {
        throw new InvalidVisitTransitionError('confirmedBy');
      }
    }
  }

  static deriveStage(record: VisitRecord, identityRequired: boolean): VisitStage {
    if (record.confirmedAt) {
      return VisitStage.CONFIRMED;
    }
    if (record.identityVerified || !identityRequired) {
      return VisitStage.AWAITING_CONFIRMATION;
    }
    return VisitStage.IDENTITY_PENDING;
  }

  static isTokenExpired(record: VisitRecord, now: Date): boolean {
    return isPast(record.dailyExpiry, now);
  }

  /**
   * Time left of the stay, clamped at zero. Null until entry is confirmed.
   */
  static remainingStayMs(record: VisitRecord, now: Date): number | null {
    if (!record.confirmedAt) {
      return null;
    }
    const endsAt = record.confirmedAt.getTime() + record.requestedDurationMs;
    return Math.max(0, endsAt - now.getTime());
  }

  static isStayExpired(record: VisitRecord, now: Date): boolean {
    if (!record.confirmedAt) {
      return false;
    }
    const endsAt = record.confirmedAt.getTime() + record.requestedDurationMs;
    return now.getTime() > endsAt;
  }

  static describe(
    record: VisitRecord,
    now: Date,
    identityRequired: boolean,
  ): VisitStatus {
    return {
      stage: this.deriveStage(record, identityRequired),
      tokenExpired: this.isTokenExpired(record, now),
      stayExpired: this.isStayExpired(record, now),
      remainingStayMs: this.remainingStayMs(record, now),
    };
  }
}
