import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { TOKEN_SIGNER, TokenSigner } from '../visits/domain/ports/token-signer.port';
import { VisitRepositoryPort } from '../visits/domain/ports/visit.repository.port';

export type HealthStatus = {
  status: 'healthy' | 'unhealthy';
  store: {
    driver: string;
    reachable: boolean;
  };
  signing: string;
  identityRequired: boolean;
};

/**
 * Health Check Service
 *
 * Used by load balancers and monitoring to check that the visit store is
 * reachable. Also reports the signing mode so a misconfigured deployment
 * (signing off in production) is visible.
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly repository: VisitRepositoryPort,
    @Inject(TOKEN_SIGNER)
    private readonly signer: TokenSigner | null,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async check(): Promise<HealthStatus> {
    let reachable: boolean;
    try {
      reachable = await this.repository.healthCheck();
    } catch (error) {
      this.logger.error(
        `Visit store health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      reachable = false;
    }

    return {
      status: reachable ? 'healthy' : 'unhealthy',
      store: {
        driver: this.configService.getOrThrow('visits.store.driver', {
          infer: true,
        }),
        reachable,
      },
      signing: this.signer ? this.signer.algorithm : 'none',
      identityRequired: this.configService.getOrThrow(
        'visits.identity.required',
        { infer: true },
      ),
    };
  }
}
