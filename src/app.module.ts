import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import { AuditModule } from './audit/audit.module';
import appConfig from './config/app.config';
import { AllConfigType } from './config/config.type';
import throttlerConfig from './config/throttler.config';
import databaseConfig from './database/config/database.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { HomeModule } from './home/home.module';
import rolesConfig from './roles/config/roles.config';
import { RolesModule } from './roles/roles.module';
import visitsConfig, { visitStoreDriver } from './visits/config/visits.config';
import { VisitsModule } from './visits/visits.module';

// <database-block>
const infrastructureDatabaseModule =
  visitStoreDriver() === 'relational'
    ? [
        TypeOrmModule.forRootAsync({
          useClass: TypeOrmConfigService,
          dataSourceFactory: async (options?: DataSourceOptions) => {
            if (!options) {
              throw new Error('TypeORM options are missing');
            }
            return new DataSource(options).initialize();
          },
        }),
      ]
    : [];
// </database-block>

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        databaseConfig,
        throttlerConfig,
        rolesConfig,
        visitsConfig,
      ],
      envFilePath: ['.env'],
    }),
    ...infrastructureDatabaseModule,
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        throttlers: [
          {
            ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
            limit: configService.getOrThrow('throttler.limit', {
              infer: true,
            }),
          },
        ],
      }),
    }),
    AuditModule,
    RolesModule,
    VisitsModule,
    HomeModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
