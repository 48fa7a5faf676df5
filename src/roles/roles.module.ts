import { Module } from '@nestjs/common';
import { PrincipalAuthorizerPort } from './domain/ports/principal-authorizer.port';
import { StaticPrincipalAuthorizer } from './infrastructure/static-principal-authorizer.adapter';
import { PrincipalGuard } from './principal.guard';

@Module({
  providers: [
    {
      provide: PrincipalAuthorizerPort,
      useClass: StaticPrincipalAuthorizer,
    },
    PrincipalGuard,
  ],
  exports: [PrincipalAuthorizerPort, PrincipalGuard],
})
export class RolesModule {}
