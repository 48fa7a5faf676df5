import { Detection } from '../ports/identity-detector.port';

export enum IdentityRejectionReason {
  NO_IDENTITY_DOCUMENT = 'NO_IDENTITY_DOCUMENT',
  LOW_CONFIDENCE = 'LOW_CONFIDENCE',
}

export type IdentityVerdict =
  | { accepted: true; label: string; confidence: number }
  | {
      accepted: false;
      reason: IdentityRejectionReason;
      bestConfidence: number | null;
    };

/**
 * Accept when at least one detection carries an accepted label with
 * confidence >= threshold. Label matching ignores case.
 */
export function evaluateDetections(
  detections: Detection[],
  acceptedLabels: string[],
  threshold: number,
): IdentityVerdict {
  const labels = new Set(acceptedLabels.map((label) => label.toLowerCase()));
  const candidates = detections.filter((detection) =>
    labels.has(detection.label.toLowerCase()),
  );

  if (candidates.length === 0) {
    return {
      accepted: false,
      reason: IdentityRejectionReason.NO_IDENTITY_DOCUMENT,
      bestConfidence: null,
    };
  }

  const best = candidates.reduce((top, detection) =>
    detection.confidence > top.confidence ? detection : top,
  );
  if (best.confidence < threshold) {
    return {
      accepted: false,
      reason: IdentityRejectionReason.LOW_CONFIDENCE,
      bestConfidence: best.confidence,
    };
  }

  return { accepted: true, label: best.label, confidence: best.confidence };
}
