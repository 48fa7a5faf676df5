import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../config/config.type';
import { PrincipalAuthorizerPort } from '../domain/ports/principal-authorizer.port';
import { RoleEnum } from '../roles.enum';

/**
 * Principal/role table read once from ACCESS_PRINCIPALS.
 *
 * Admins satisfy every role check.
 */
@Injectable()
export class StaticPrincipalAuthorizer implements PrincipalAuthorizerPort {
  private readonly logger = new Logger(StaticPrincipalAuthorizer.name);
  private readonly grants: Map<string, Set<RoleEnum>>;

  constructor(configService: ConfigService<AllConfigType>) {
    const principals = configService.getOrThrow('roles.principals', {
      infer: true,
    });

    this.grants = new Map();
    for (const { principalId, role } of principals) {
      const roles = this.grants.get(principalId) ?? new Set<RoleEnum>();
      roles.add(role);
      this.grants.set(principalId, roles);
    }

    this.logger.log(`Loaded role grants for ${this.grants.size} principal(s)`);
  }

  async isAuthorized(principalId: string, role: RoleEnum): Promise<boolean> {
    const roles = this.grants.get(principalId);
    if (!roles) {
      return false;
    }
    return roles.has(role) || roles.has(RoleEnum.admin);
  }
}
