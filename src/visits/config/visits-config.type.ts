export type VisitStoreDriver = 'memory' | 'relational';

export type VisitsConfig = {
  store: {
    driver: VisitStoreDriver;
    updateMaxAttempts: number; // optimistic-lock retries per logical update
  };
  token: {
    bytes: number; // entropy per token, base64url encoded
    issueMaxAttempts: number;
  };
  signing: {
    algorithm: 'none' | 'hmac-sha256' | 'rsa-sha256';
    secret?: string;
    privateKey?: string; // PEM
    publicKey?: string; // PEM
  };
  identity: {
    required: boolean;
    confidenceThreshold: number;
    labels: string[];
    detectorUrl?: string;
    detectorTimeoutMs: number;
    maxArtifactBytes: number;
  };
};
