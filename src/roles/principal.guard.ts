import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
  createParamDecorator,
} from '@nestjs/common';
import { Request } from 'express';

export const PRINCIPAL_HEADER = 'x-principal-id';

export type PrincipalRequest = Request & { principalId?: string };

/**
 * Resolves the acting principal from the x-principal-id header.
 *
 * Only identifies the caller. Whether that principal may act in a role is
 * decided by the domain services through PrincipalAuthorizerPort, so the
 * same rule holds for callers that do not come through HTTP.
 */
@Injectable()
export class PrincipalGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<PrincipalRequest>();
    const header = request.headers[PRINCIPAL_HEADER];
    const principalId = (Array.isArray(header) ? header[0] : header)?.trim();

    if (!principalId) {
      throw new UnauthorizedException({
        error: 'PRINCIPAL_REQUIRED',
        message: `Missing ${PRINCIPAL_HEADER} header`,
        status: 401,
      });
    }

    request.principalId = principalId;
    return true;
  }
}

export const Principal = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string => {
    const request = context.switchToHttp().getRequest<PrincipalRequest>();
    if (!request.principalId) {
      throw new UnauthorizedException('Principal not resolved');
    }
    return request.principalId;
  },
);
