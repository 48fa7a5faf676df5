import { Injectable } from '@nestjs/common';
import { NullableType } from '../../../../utils/types/nullable.type';
import { VisitRecord } from '../../../domain/entities/visit-record.entity';
import {
  VisitNotFoundError,
  VisitUpdateConflictError,
} from '../../../domain/errors/visit.errors';
import {
  VisitMutator,
  VisitRepositoryPort,
} from '../../../domain/ports/visit.repository.port';
import { VisitStateMachine } from '../../../domain/utils/visit-state-machine.util';
import {
  VisitRecordSnapshot,
  deserializeVisitRecord,
  serializeVisitRecord,
} from '../visit-record.codec';

/**
 * Process-local credential store.
 *
 * Records are held in their persisted encoding, so callers only ever get
 * copies. A mutator runs synchronously between load and store, which makes
 * each update() atomic on the event loop; competing updates on one token
 * are applied one after the other and the later one sees the earlier one's
 * result.
 */
@Injectable()
export class InMemoryVisitRepository implements VisitRepositoryPort {
  private readonly records = new Map<string, VisitRecordSnapshot>();

  async create(record: VisitRecord): Promise<VisitRecord> {
    if (this.records.has(record.token)) {
      throw new VisitUpdateConflictError('Visit token already exists');
    }
    const snapshot = serializeVisitRecord(record);
    this.records.set(record.token, snapshot);
    return deserializeVisitRecord(snapshot);
  }

  async findByToken(token: string): Promise<NullableType<VisitRecord>> {
    const snapshot = this.records.get(token);
    return snapshot ? deserializeVisitRecord(snapshot) : null;
  }

  async update(token: string, mutator: VisitMutator): Promise<VisitRecord> {
    const snapshot = this.records.get(token);
    if (!snapshot) {
      throw new VisitNotFoundError();
    }

    const current = deserializeVisitRecord(snapshot);
    const next = mutator(current);
    if (next === current) {
      return current;
    }

    VisitStateMachine.assertMonotonicTransition(current, next);
    const nextSnapshot = serializeVisitRecord(next);
    this.records.set(token, nextSnapshot);
    return deserializeVisitRecord(nextSnapshot);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
