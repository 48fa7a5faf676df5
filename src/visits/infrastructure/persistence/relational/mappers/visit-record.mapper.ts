import { VisitRecord } from '../../../../domain/entities/visit-record.entity';
import {
  fromIsoDuration,
  toIsoDuration,
} from '../../../../domain/utils/duration.util';
import { VisitRecordDecodeError } from '../../visit-record.codec';
import { VisitRecordEntity } from '../entities/visit-record.entity';

function readRequestedDuration(value: string): number {
  if (!value) {
    return 0;
  }
  const durationMs = fromIsoDuration(value);
  if (durationMs === null) {
    throw new VisitRecordDecodeError('requestedDuration');
  }
  return durationMs;
}

export class VisitRecordMapper {
  static toDomain(raw: VisitRecordEntity): VisitRecord {
    return {
      token: raw.token,
      signature: raw.signature ?? null,
      visitorName: raw.visitorName ?? '',
      hostName: raw.hostName ?? '',
      location: raw.location ?? '',
      purpose: raw.purpose ?? '',
      requestedDurationMs: readRequestedDuration(raw.requestedDuration),
      issuedAt: raw.issuedAt,
      dailyExpiry: raw.dailyExpiry,
      identityVerified: raw.identityVerified ?? false,
      identityArtifact: raw.identityArtifact ?? null,
      confirmedAt: raw.confirmedAt ?? null,
      issuedBy: raw.issuedBy ?? '',
      confirmedBy: raw.confirmedBy ?? null,
    };
  }

  static toPersistence(domain: VisitRecord): VisitRecordEntity {
    const entity = new VisitRecordEntity();
    entity.token = domain.token;
    entity.signature = domain.signature;
    entity.visitorName = domain.visitorName;
    entity.hostName = domain.hostName;
    entity.location = domain.location;
    entity.purpose = domain.purpose;
    entity.requestedDuration = toIsoDuration(domain.requestedDurationMs);
    entity.issuedAt = domain.issuedAt;
    entity.dailyExpiry = domain.dailyExpiry;
    entity.identityVerified = domain.identityVerified;
    entity.identityArtifact = domain.identityArtifact;
    entity.confirmedAt = domain.confirmedAt;
    entity.issuedBy = domain.issuedBy;
    entity.confirmedBy = domain.confirmedBy;
    return entity;
  }
}
