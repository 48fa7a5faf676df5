import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuditModule } from '../audit/audit.module';
import { AllConfigType } from '../config/config.type';
import { RolesModule } from '../roles/roles.module';
import { visitStoreDriver } from './config/visits.config';
import { Clock } from './domain/ports/clock.port';
import { IdentityDetectorPort } from './domain/ports/identity-detector.port';
import { TOKEN_SIGNER } from './domain/ports/token-signer.port';
import { ConfirmationDomainService } from './domain/services/confirmation.domain.service';
import { IdentityGateDomainService } from './domain/services/identity-gate.domain.service';
import { TokenAuthenticatorDomainService } from './domain/services/token-authenticator.domain.service';
import { TokenIssuerDomainService } from './domain/services/token-issuer.domain.service';
import { VisitTokenGenerator } from './domain/services/visit-token.generator';
import { SystemClock } from './infrastructure/clock/system-clock';
import { HttpIdentityDetectorAdapter } from './infrastructure/detector/http-identity-detector.adapter';
import { MemoryVisitPersistenceModule } from './infrastructure/persistence/memory/memory-persistence.module';
import { RelationalVisitPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { createTokenSigner } from './infrastructure/signing/token-signer.factory';
import { VisitsController } from './visits.controller';
import { VisitsService } from './visits.service';

// <database-block>
const infrastructurePersistenceModule =
  visitStoreDriver() === 'relational'
    ? RelationalVisitPersistenceModule
    : MemoryVisitPersistenceModule;
// </database-block>

@Module({
  imports: [infrastructurePersistenceModule, RolesModule, AuditModule],
  controllers: [VisitsController],
  providers: [
    // Application layer
    VisitsService,

    // Domain layer
    TokenIssuerDomainService,
    TokenAuthenticatorDomainService,
    IdentityGateDomainService,
    ConfirmationDomainService,
    VisitTokenGenerator,

    // Infrastructure adapters
    {
      provide: Clock,
      useClass: SystemClock,
    },
    {
      provide: IdentityDetectorPort,
      useClass: HttpIdentityDetectorAdapter,
    },
    {
      provide: TOKEN_SIGNER,
      useFactory: (configService: ConfigService<AllConfigType>) =>
        createTokenSigner(configService),
      inject: [ConfigService],
    },
  ],
  exports: [VisitsService, infrastructurePersistenceModule, TOKEN_SIGNER],
})
export class VisitsModule {}
