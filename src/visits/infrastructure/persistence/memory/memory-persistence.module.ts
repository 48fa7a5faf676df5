import { Module } from '@nestjs/common';
import { VisitRepositoryPort } from '../../../domain/ports/visit.repository.port';
import { InMemoryVisitRepository } from './in-memory-visit.repository';

@Module({
  providers: [
    {
      provide: VisitRepositoryPort,
      useClass: InMemoryVisitRepository,
    },
  ],
  exports: [VisitRepositoryPort],
})
export class MemoryVisitPersistenceModule {}
