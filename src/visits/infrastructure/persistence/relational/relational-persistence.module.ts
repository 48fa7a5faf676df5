import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { VisitRepositoryPort } from '../../../domain/ports/visit.repository.port';
import { VisitRecordEntity } from './entities/visit-record.entity';
import { VisitRecordRelationalRepository } from './repositories/visit-record.repository';

@Module({
  imports: [TypeOrmModule.forFeature([VisitRecordEntity])],
  providers: [
    {
      provide: VisitRepositoryPort,
      useClass: VisitRecordRelationalRepository,
    },
  ],
  exports: [VisitRepositoryPort],
})
export class RelationalVisitPersistenceModule {}
