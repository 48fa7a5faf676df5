import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../src/config/config.type';
import { PrincipalGrant } from '../../src/roles/config/roles-config.type';
import { RoleEnum } from '../../src/roles/roles.enum';
import { VisitsConfig } from '../../src/visits/config/visits-config.type';

export const HOST_PRINCIPAL = 'host-1';
export const SECURITY_PRINCIPAL = 'guard-1';
export const ADMIN_PRINCIPAL = 'admin-1';
export const VISITOR_PRINCIPAL = 'visitor-1';

export const TEST_PRINCIPALS: PrincipalGrant[] = [
  { principalId: HOST_PRINCIPAL, role: RoleEnum.host },
  { principalId: SECURITY_PRINCIPAL, role: RoleEnum.security },
  { principalId: ADMIN_PRINCIPAL, role: RoleEnum.admin },
];

export type VisitsConfigOverrides = {
  store?: Partial<VisitsConfig['store']>;
  token?: Partial<VisitsConfig['token']>;
  signing?: VisitsConfig['signing'];
  identity?: Partial<VisitsConfig['identity']>;
};

export function createTestConfig(
  overrides: VisitsConfigOverrides = {},
): AllConfigType {
  return {
    app: {
      nodeEnv: 'test',
      name: 'Visit Authorization API',
      port: 3000,
      apiPrefix: 'api',
      publicUrl: 'https://visits.test',
      swaggerEnabled: false,
    },
    throttler: { ttl: 60000, limit: 1000 },
    database: {
      port: 5432,
      synchronize: false,
      migrationsRun: false,
      maxConnections: 10,
      sslEnabled: false,
      rejectUnauthorized: false,
      logging: false,
    },
    roles: { principals: TEST_PRINCIPALS },
    visits: {
      store: { driver: 'memory', updateMaxAttempts: 3, ...overrides.store },
      token: { bytes: 32, issueMaxAttempts: 3, ...overrides.token },
      signing: overrides.signing ?? { algorithm: 'none' },
      identity: {
        required: true,
        confidenceThreshold: 0.7,
        labels: ['id_card', 'passport', 'driving_license'],
        detectorTimeoutMs: 10000,
        maxArtifactBytes: 10 * 1024 * 1024,
        ...overrides.identity,
      },
    },
  };
}

export function createTestConfigService(
  overrides: VisitsConfigOverrides = {},
): ConfigService<AllConfigType> {
  return new ConfigService<AllConfigType>(createTestConfig(overrides));
}
