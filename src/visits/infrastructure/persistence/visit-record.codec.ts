import { plainToClass } from 'class-transformer';
import {
  IsBoolean,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  validateSync,
} from 'class-validator';
import { VisitRecord } from '../../domain/entities/visit-record.entity';
import { fromIsoDuration, toIsoDuration } from '../../domain/utils/duration.util';

/**
 * Durable encoding of a VisitRecord.
 *
 * Field names are stable. Timestamps are ISO-8601 strings and the stay
 * length an ISO-8601 duration. Readers treat a missing field as its zero
 * value so records written by older versions keep loading.
 */
export interface VisitRecordSnapshot {
  token: string;
  signature: string | null;
  visitorName: string;
  hostName: string;
  location: string;
  purpose: string;
  requestedDuration: string;
  issuedAt: string;
  dailyExpiry: string;
  identityVerified: boolean;
  identityArtifact: string | null;
  confirmedAt: string | null;
  issuedBy: string;
  confirmedBy: string | null;
}

class PersistedVisitRecord {
  @IsString()
  @IsNotEmpty()
  token!: string;

  @IsString()
  @IsOptional()
  signature?: string | null;

  @IsString()
  @IsOptional()
  visitorName?: string;

  @IsString()
  @IsOptional()
  hostName?: string;

  @IsString()
  @IsOptional()
  location?: string;

  @IsString()
  @IsOptional()
  purpose?: string;

  @IsString()
  @IsOptional()
  requestedDuration?: string;

  @IsISO8601()
  issuedAt!: string;

  @IsISO8601()
  dailyExpiry!: string;

  @IsBoolean()
  @IsOptional()
  identityVerified?: boolean;

  @IsString()
  @IsOptional()
  identityArtifact?: string | null;

  @IsISO8601()
  @IsOptional()
  confirmedAt?: string | null;

  @IsString()
  @IsOptional()
  issuedBy?: string;

  @IsString()
  @IsOptional()
  confirmedBy?: string | null;
}

export class VisitRecordDecodeError extends Error {
  constructor(reason: string) {
    super(`Stored visit record is unreadable: ${reason}`);
    this.name = 'VisitRecordDecodeError';
  }
}

export function serializeVisitRecord(record: VisitRecord): VisitRecordSnapshot {
  return {
    token: record.token,
    signature: record.signature,
    visitorName: record.visitorName,
    hostName: record.hostName,
    location: record.location,
    purpose: record.purpose,
    requestedDuration: toIsoDuration(record.requestedDurationMs),
    issuedAt: record.issuedAt.toISOString(),
    dailyExpiry: record.dailyExpiry.toISOString(),
    identityVerified: record.identityVerified,
    identityArtifact: record.identityArtifact,
    confirmedAt: record.confirmedAt ? record.confirmedAt.toISOString() : null,
    issuedBy: record.issuedBy,
    confirmedBy: record.confirmedBy,
  };
}

/**
 * @throws VisitRecordDecodeError when token, issuedAt or dailyExpiry is
 *   missing or malformed, or a present field has the wrong type
 */
export function deserializeVisitRecord(plain: object): VisitRecord {
  const persisted = plainToClass(PersistedVisitRecord, plain);
  const errors = validateSync(persisted);
  if (errors.length > 0) {
    throw new VisitRecordDecodeError(
      errors.map((error) => error.property).join(', '),
    );
  }

  let requestedDurationMs = 0;
  if (persisted.requestedDuration) {
    const parsed = fromIsoDuration(persisted.requestedDuration);
    if (parsed === null) {
      throw new VisitRecordDecodeError('requestedDuration');
    }
    requestedDurationMs = parsed;
  }

  return {
    token: persisted.token,
    signature: persisted.signature ?? null,
    visitorName: persisted.visitorName ?? '',
    hostName: persisted.hostName ?? '',
    location: persisted.location ?? '',
    purpose: persisted.purpose ?? '',
    requestedDurationMs,
    issuedAt: new Date(persisted.issuedAt),
    dailyExpiry: new Date(persisted.dailyExpiry),
    identityVerified: persisted.identityVerified ?? false,
    identityArtifact: persisted.identityArtifact ?? null,
    confirmedAt: persisted.confirmedAt ? new Date(persisted.confirmedAt) : null,
    issuedBy: persisted.issuedBy ?? '',
    confirmedBy: persisted.confirmedBy ?? null,
  };
}
