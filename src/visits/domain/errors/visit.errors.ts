import { HttpStatus } from '@nestjs/common';

export enum VisitErrorCode {
  UNKNOWN_TOKEN = 'UNKNOWN_TOKEN',
  SIGNATURE_INVALID = 'SIGNATURE_INVALID',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  NOT_VERIFIED = 'NOT_VERIFIED',
  ALREADY_CONFIRMED = 'ALREADY_CONFIRMED',
  DETECTOR_UNAVAILABLE = 'DETECTOR_UNAVAILABLE',
  UPDATE_CONFLICT = 'UPDATE_CONFLICT',
  ISSUANCE_FAILED = 'ISSUANCE_FAILED',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  INVALID_VISIT_DETAILS = 'INVALID_VISIT_DETAILS',
  INVALID_ARTIFACT = 'INVALID_ARTIFACT',
  UNAUTHORIZED_PRINCIPAL = 'UNAUTHORIZED_PRINCIPAL',
}

/**
 * Base class for every condition the visit lifecycle reports to its caller.
 *
 * None of them are fatal to the process; each one ends a single request.
 */
export abstract class VisitError extends Error {
  abstract readonly code: VisitErrorCode;
  abstract readonly status: HttpStatus;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      status: this.status,
    };
  }
}

export class VisitNotFoundError extends VisitError {
  readonly code = VisitErrorCode.UNKNOWN_TOKEN;
  readonly status = HttpStatus.NOT_FOUND;

  constructor() {
    super('Visit token not found');
  }
}

export class VisitSignatureInvalidError extends VisitError {
  readonly code = VisitErrorCode.SIGNATURE_INVALID;
  readonly status = HttpStatus.UNAUTHORIZED;

  constructor(message = 'Visit signature is missing or invalid') {
    super(message);
  }
}

export class VisitTokenExpiredError extends VisitError {
  readonly code = VisitErrorCode.TOKEN_EXPIRED;
  readonly status = HttpStatus.GONE;

  constructor(readonly expiredAt: Date) {
    super(`Visit token expired at ${expiredAt.toISOString()}`);
  }
}

export class VisitNotVerifiedError extends VisitError {
  readonly code = VisitErrorCode.NOT_VERIFIED;
  readonly status = HttpStatus.PRECONDITION_FAILED;

  constructor() {
    super('Visitor identity has not been verified');
  }
}

export class VisitAlreadyConfirmedError extends VisitError {
  readonly code = VisitErrorCode.ALREADY_CONFIRMED;
  readonly status = HttpStatus.CONFLICT;

  constructor(readonly confirmedAt: Date) {
    super(`Entry was already confirmed at ${confirmedAt.toISOString()}`);
  }
}

export class DetectorUnavailableError extends VisitError {
  readonly code = VisitErrorCode.DETECTOR_UNAVAILABLE;
  readonly status = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(reason: string) {
    super(`Identity detector unavailable: ${reason}`);
  }
}

export class VisitUpdateConflictError extends VisitError {
  readonly code = VisitErrorCode.UPDATE_CONFLICT;
  readonly status = HttpStatus.CONFLICT;

  constructor(message = 'Visit record was modified concurrently') {
    super(message);
  }
}

export class VisitIssuanceError extends VisitError {
  readonly code = VisitErrorCode.ISSUANCE_FAILED;
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(attempts: number) {
    super(`Could not allocate a unique visit token after ${attempts} attempt(s)`);
  }
}

export class InvalidVisitTransitionError extends VisitError {
  readonly code = VisitErrorCode.INVALID_TRANSITION;
  readonly status = HttpStatus.CONFLICT;

  constructor(field: string) {
    super(`Visit field "${field}" cannot be changed this way`);
  }
}

export class InvalidVisitDetailsError extends VisitError {
  readonly code = VisitErrorCode.INVALID_VISIT_DETAILS;
  readonly status = HttpStatus.BAD_REQUEST;

  constructor(readonly fields: string[]) {
    super(`Visit details must not be empty: ${fields.join(', ')}`);
  }
}

export class InvalidIdentityArtifactError extends VisitError {
  readonly code = VisitErrorCode.INVALID_ARTIFACT;
  readonly status = HttpStatus.BAD_REQUEST;
}

export class PrincipalNotAuthorizedError extends VisitError {
  readonly code = VisitErrorCode.UNAUTHORIZED_PRINCIPAL;
  readonly status = HttpStatus.FORBIDDEN;

  constructor(principalId: string, role: string) {
    super(`Principal "${principalId}" is not authorized as ${role}`);
  }
}
