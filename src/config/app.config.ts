import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import validateConfig from '../utils/validate-config';
import { AppConfig } from './app-config.type';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariablesValidator {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  APP_PORT?: number;

  @IsString()
  @IsOptional()
  APP_NAME?: string;

  @IsString()
  @IsOptional()
  API_PREFIX?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  APP_PUBLIC_URL?: string;

  @IsBoolean()
  @IsOptional()
  SWAGGER_ENABLED?: boolean;
}

export default registerAs<AppConfig>('app', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  const port = process.env.APP_PORT
    ? parseInt(process.env.APP_PORT, 10)
    : process.env.PORT
      ? parseInt(process.env.PORT, 10)
      : 3000;

  return {
    nodeEnv: process.env.NODE_ENV || 'development',
    name: process.env.APP_NAME || 'Visit Authorization API',
    port,
    apiPrefix: process.env.API_PREFIX || 'api',
    // Redemption URLs are built on this base, so no trailing slash
    publicUrl: (process.env.APP_PUBLIC_URL ?? `http://localhost:${port}`).replace(
      /\/+$/,
      '',
    ),
    swaggerEnabled: process.env.SWAGGER_ENABLED !== 'false',
  };
});
