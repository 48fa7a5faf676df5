import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { VisitsModule } from '../visits/visits.module';

@Module({
  imports: [
    // Visit store and signer for the health check
    VisitsModule,
  ],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
  exports: [HealthService],
})
export class HomeModule {}
