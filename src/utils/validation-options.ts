import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

type FieldErrors = { [property: string]: string | FieldErrors };

function collectFieldErrors(errors: ValidationError[]): FieldErrors {
  const result: FieldErrors = {};
  for (const error of errors) {
    const children = error.children ?? [];
    result[error.property] =
      children.length > 0
        ? collectFieldErrors(children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return result;
}

/**
 * Global ValidationPipe options.
 *
 * Rejections use the same body shape as visit domain errors so clients only
 * branch on `error`.
 */
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) => {
    return new BadRequestException({
      error: 'VALIDATION_FAILED',
      message: 'Request validation failed',
      status: HttpStatus.BAD_REQUEST,
      errors: collectFieldErrors(errors),
    });
  },
};

export default validationOptions;
