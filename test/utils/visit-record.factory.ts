import { VisitRecord } from '../../src/visits/domain/entities/visit-record.entity';
import { localTime } from './fixed-clock';

export function buildVisitRecord(
  overrides: Partial<VisitRecord> = {},
): VisitRecord {
  return {
    token: 'token-abc',
    signature: null,
    visitorName: 'Ada Lovelace',
    hostName: 'Charles Babbage',
    location: 'Building B',
    purpose: 'Design review',
    requestedDurationMs: 30 * 60 * 1000,
    issuedAt: localTime(9, 0),
    dailyExpiry: localTime(23, 59, 59),
    identityVerified: false,
    identityArtifact: null,
    confirmedAt: null,
    issuedBy: 'host-1',
    confirmedBy: null,
    ...overrides,
  };
}
