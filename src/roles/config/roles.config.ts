import { registerAs } from '@nestjs/config';
import { IsOptional, Matches } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { RoleEnum } from '../roles.enum';
import { PrincipalGrant, RolesConfig } from './roles-config.type';

class EnvironmentVariablesValidator {
  // "host-1:host,guard-1:security"
  @Matches(/^\s*([^:,\s]+:(host|security|admin)\s*(,\s*|$))*$/)
  @IsOptional()
  ACCESS_PRINCIPALS?: string;
}

const roles: readonly RoleEnum[] = Object.values(RoleEnum);

export function parsePrincipalGrants(value: string | undefined): PrincipalGrant[] {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .flatMap((entry) => {
      const [principalId, roleName] = entry.split(':');
      const role = roles.find((candidate) => candidate === roleName);
      return principalId && role ? [{ principalId, role }] : [];
    });
}

export default registerAs<RolesConfig>('roles', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    principals: parsePrincipalGrants(process.env.ACCESS_PRINCIPALS),
  };
});
