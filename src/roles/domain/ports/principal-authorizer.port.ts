import { RoleEnum } from '../../roles.enum';

/**
 * Answers "may this principal act in this role?".
 *
 * Account registration and approval live outside this service; whatever
 * system owns them is plugged in behind this port.
 */
export abstract class PrincipalAuthorizerPort {
  abstract isAuthorized(principalId: string, role: RoleEnum): Promise<boolean>;
}
