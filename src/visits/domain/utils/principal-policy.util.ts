import { AuditService, VisitEventType } from '../../../audit/audit.service';
import { PrincipalAuthorizerPort } from '../../../roles/domain/ports/principal-authorizer.port';
import { RoleEnum } from '../../../roles/roles.enum';
import { PrincipalNotAuthorizedError } from '../errors/visit.errors';

/**
 * @throws PrincipalNotAuthorizedError (audited) when the principal lacks the role
 */
export async function assertPrincipalRole(
  authorizer: PrincipalAuthorizerPort,
  auditService: AuditService,
  principalId: string,
  role: RoleEnum,
): Promise<void> {
  if (await authorizer.isAuthorized(principalId, role)) {
    return;
  }

  auditService.logVisitEvent({
    event: VisitEventType.UNAUTHORIZED_PRINCIPAL,
    success: false,
    principalId,
    metadata: { requiredRole: role },
  });
  throw new PrincipalNotAuthorizedError(principalId, role);
}
