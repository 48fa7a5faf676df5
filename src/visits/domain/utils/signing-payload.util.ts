import { VisitRecord } from '../entities/visit-record.entity';
import { toIsoDuration } from './duration.util';

type SignedFields = Pick<
  VisitRecord,
  | 'token'
  | 'visitorName'
  | 'hostName'
  | 'location'
  | 'purpose'
  | 'requestedDurationMs'
  | 'issuedAt'
  | 'dailyExpiry'
>;

/**
 * Canonical byte string covered by a visit signature.
 *
 * A JSON array keeps field boundaries unambiguous. Changing the field list
 * or order invalidates every outstanding signature.
 */
export function buildSigningPayload(record: SignedFields): string {
  return JSON.stringify([
    record.token,
    record.visitorName,
    record.hostName,
    record.location,
    record.purpose,
    toIsoDuration(record.requestedDurationMs),
    record.issuedAt.toISOString(),
    record.dailyExpiry.toISOString(),
  ]);
}
