import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { VisitRecord } from '../../../../domain/entities/visit-record.entity';
import {
  VisitNotFoundError,
  VisitUpdateConflictError,
} from '../../../../domain/errors/visit.errors';
import {
  VisitMutator,
  VisitRepositoryPort,
} from '../../../../domain/ports/visit.repository.port';
import { VisitStateMachine } from '../../../../domain/utils/visit-state-machine.util';
import { VisitRecordEntity } from '../entities/visit-record.entity';
import { VisitRecordMapper } from '../mappers/visit-record.mapper';

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    'code' in error.driverError &&
    error.driverError.code === UNIQUE_VIOLATION
  );
}

/**
 * Postgres-backed credential store.
 *
 * Updates are optimistic: the row is written only if its version is still
 * the one that was read (TypeORM bumps the version column on every update).
 * A writer that lost the race sees zero affected rows and gets
 * VisitUpdateConflictError.
 */
@Injectable()
export class VisitRecordRelationalRepository implements VisitRepositoryPort {
  private readonly logger = new Logger(VisitRecordRelationalRepository.name);

  constructor(
    @InjectRepository(VisitRecordEntity)
    private readonly repository: Repository<VisitRecordEntity>,
  ) {}

  async create(record: VisitRecord): Promise<VisitRecord> {
    try {
      await this.repository.insert(VisitRecordMapper.toPersistence(record));
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new VisitUpdateConflictError('Visit token already exists');
      }
      throw error;
    }
    return record;
  }

  async findByToken(token: string): Promise<NullableType<VisitRecord>> {
    const entity = await this.repository.findOne({ where: { token } });
    return entity ? VisitRecordMapper.toDomain(entity) : null;
  }

  async update(token: string, mutator: VisitMutator): Promise<VisitRecord> {
    const entity = await this.repository.findOne({ where: { token } });
    if (!entity) {
      throw new VisitNotFoundError();
    }

    const current = VisitRecordMapper.toDomain(entity);
    const next = mutator(current);
    if (next === current) {
      return current;
    }

    VisitStateMachine.assertMonotonicTransition(current, next);

    // Only the lifecycle columns can differ after the transition check
    const result = await this.repository.update(
      { token, version: entity.version },
      {
        identityVerified: next.identityVerified,
        identityArtifact: next.identityArtifact,
        confirmedAt: next.confirmedAt,
        confirmedBy: next.confirmedBy,
      },
    );

    if (!result.affected) {
      this.logger.warn(
        `Optimistic lock lost on visit update (read version ${entity.version})`,
      );
      throw new VisitUpdateConflictError();
    }

    return next;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.repository.query('SELECT 1');
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Visit store health check failed: ${message}`);
      return false;
    }
  }
}
