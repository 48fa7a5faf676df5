export interface IdentityArtifact {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

export interface Detection {
  label: string;
  confidence: number; // 0-1
}

/**
 * External object-detection model that scores an uploaded ID image.
 *
 * Implementations throw DetectorUnavailableError when the model cannot be
 * reached or answers with something unusable; an empty list means "looked,
 * found nothing".
 */
export abstract class IdentityDetectorPort {
  abstract detect(artifact: IdentityArtifact): Promise<Detection[]>;
}
