export type AppConfig = {
  nodeEnv: string;
  name: string;
  port: number;
  apiPrefix: string;
  publicUrl: string;
  swaggerEnabled: boolean;
};
