import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { VisitStoreDriver, VisitsConfig } from './visits-config.type';

class EnvironmentVariablesValidator {
  @IsIn(['memory', 'relational'])
  @IsOptional()
  VISIT_STORE_DRIVER?: VisitStoreDriver;

  @IsInt()
  @Min(1)
  @Max(10)
  @IsOptional()
  VISIT_UPDATE_MAX_ATTEMPTS?: number;

  // 6 bytes = 48 bits, the floor for an unguessable token
  @IsInt()
  @Min(6)
  @Max(64)
  @IsOptional()
  VISIT_TOKEN_BYTES?: number;

  @IsInt()
  @Min(1)
  @Max(10)
  @IsOptional()
  VISIT_ISSUE_MAX_ATTEMPTS?: number;

  @IsIn(['none', 'hmac-sha256', 'rsa-sha256'])
  @IsOptional()
  VISIT_SIGNING_ALGORITHM?: VisitsConfig['signing']['algorithm'];

  @ValidateIf((env) => env.VISIT_SIGNING_ALGORITHM === 'hmac-sha256')
  @IsString()
  VISIT_SIGNING_SECRET?: string;

  // rsa-sha256 needs at least one key; a public key alone verifies only
  @ValidateIf(
    (env) =>
      env.VISIT_SIGNING_ALGORITHM === 'rsa-sha256' &&
      (env.VISIT_SIGNING_PRIVATE_KEY !== undefined ||
        !env.VISIT_SIGNING_PUBLIC_KEY),
  )
  @IsString()
  VISIT_SIGNING_PRIVATE_KEY?: string;

  @ValidateIf(
    (env) =>
      env.VISIT_SIGNING_ALGORITHM === 'rsa-sha256' &&
      (env.VISIT_SIGNING_PUBLIC_KEY !== undefined ||
        !env.VISIT_SIGNING_PRIVATE_KEY),
  )
  @IsString()
  VISIT_SIGNING_PUBLIC_KEY?: string;

  @IsBoolean()
  @IsOptional()
  VISIT_IDENTITY_REQUIRED?: boolean;

  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  VISIT_IDENTITY_CONFIDENCE_THRESHOLD?: number;

  @IsString()
  @IsOptional()
  VISIT_IDENTITY_LABELS?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  VISIT_IDENTITY_DETECTOR_URL?: string;

  @IsInt()
  @Min(100)
  @IsOptional()
  VISIT_IDENTITY_DETECTOR_TIMEOUT_MS?: number;

  @IsNumber()
  @Min(1)
  @Max(50)
  @IsOptional()
  VISIT_IDENTITY_MAX_ARTIFACT_MB?: number;
}

// PEM keys usually arrive through env files with literal "\n"
function unescapePem(value: string | undefined): string | undefined {
  return value?.replace(/\\n/g, '\n');
}

/**
 * Which persistence module to wire. Read at import time by VisitsModule, the
 * same way the database type decides which TypeORM setup is loaded.
 */
export function visitStoreDriver(): VisitStoreDriver {
  return process.env.VISIT_STORE_DRIVER === 'relational'
    ? 'relational'
    : 'memory';
}

function resolveSigningAlgorithm(): VisitsConfig['signing']['algorithm'] {
  switch (process.env.VISIT_SIGNING_ALGORITHM) {
    case 'hmac-sha256':
      return 'hmac-sha256';
    case 'rsa-sha256':
      return 'rsa-sha256';
    default:
      return 'none';
  }
}

export default registerAs<VisitsConfig>('visits', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  const maxArtifactMb = process.env.VISIT_IDENTITY_MAX_ARTIFACT_MB
    ? parseFloat(process.env.VISIT_IDENTITY_MAX_ARTIFACT_MB)
    : 10;

  return {
    store: {
      driver: visitStoreDriver(),
      updateMaxAttempts: process.env.VISIT_UPDATE_MAX_ATTEMPTS
        ? parseInt(process.env.VISIT_UPDATE_MAX_ATTEMPTS, 10)
        : 3,
    },
    token: {
      bytes: process.env.VISIT_TOKEN_BYTES
        ? parseInt(process.env.VISIT_TOKEN_BYTES, 10)
        : 32,
      issueMaxAttempts: process.env.VISIT_ISSUE_MAX_ATTEMPTS
        ? parseInt(process.env.VISIT_ISSUE_MAX_ATTEMPTS, 10)
        : 3,
    },
    signing: {
      algorithm: resolveSigningAlgorithm(),
      secret: process.env.VISIT_SIGNING_SECRET,
      privateKey: unescapePem(process.env.VISIT_SIGNING_PRIVATE_KEY),
      publicKey: unescapePem(process.env.VISIT_SIGNING_PUBLIC_KEY),
    },
    identity: {
      required: process.env.VISIT_IDENTITY_REQUIRED !== 'false',
      // Policy constant: 0.70 unless the deployment tunes it
      confidenceThreshold: process.env.VISIT_IDENTITY_CONFIDENCE_THRESHOLD
        ? parseFloat(process.env.VISIT_IDENTITY_CONFIDENCE_THRESHOLD)
        : 0.7,
      labels: (
        process.env.VISIT_IDENTITY_LABELS || 'id_card,passport,driving_license'
      )
        .split(',')
        .map((label) => label.trim().toLowerCase())
        .filter((label) => label.length > 0),
      detectorUrl: process.env.VISIT_IDENTITY_DETECTOR_URL?.replace(/\/+$/, ''),
      detectorTimeoutMs: process.env.VISIT_IDENTITY_DETECTOR_TIMEOUT_MS
        ? parseInt(process.env.VISIT_IDENTITY_DETECTOR_TIMEOUT_MS, 10)
        : 10000,
      maxArtifactBytes: Math.round(maxArtifactMb * 1024 * 1024),
    },
  };
});
