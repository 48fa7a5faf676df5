import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { RolesConfig } from '../roles/config/roles-config.type';
import { VisitsConfig } from '../visits/config/visits-config.type';

export type AllConfigType = {
  app: AppConfig;
  throttler: ThrottlerConfig;
  database: DatabaseConfig;
  roles: RolesConfig;
  visits: VisitsConfig;
};
