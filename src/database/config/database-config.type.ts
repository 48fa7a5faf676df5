export type DatabaseConfig = {
  url?: string;
  host?: string;
  port: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize: boolean;
  migrationsRun: boolean;
  maxConnections: number;
  sslEnabled: boolean;
  rejectUnauthorized: boolean;
  ca?: string;
  key?: string;
  cert?: string;
  // false = no logging, true = everything, array = selected channels
  logging: boolean | ('query' | 'error' | 'schema' | 'warn' | 'info' | 'log')[];
};
