/**
 * Domain entity for a visit authorization.
 *
 * One record per token. Ownership of the mutable fields is split:
 * - TokenIssuer creates the record; everything except the fields below is
 *   fixed from then on
 * - IdentityGate flips identityVerified (and records identityArtifact)
 * - ConfirmationEngine sets confirmedAt (and confirmedBy)
 *
 * None of these ever go back: identityVerified only false → true,
 * confirmedAt only null → set.
 */
export interface VisitRecord {
  token: string; // base64url, unguessable
  signature: string | null; // set iff the deployment signs tokens
  visitorName: string;
  hostName: string;
  location: string;
  purpose: string;
  requestedDurationMs: number; // stay length, counted from confirmedAt
  issuedAt: Date;
  dailyExpiry: Date; // hard cutoff, end of issuance day
  identityVerified: boolean;
  identityArtifact: string | null; // uploaded file name, for audit only
  confirmedAt: Date | null;
  issuedBy: string; // host principal
  confirmedBy: string | null; // security principal
}
