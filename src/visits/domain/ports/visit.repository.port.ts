import { NullableType } from '../../../utils/types/nullable.type';
import { VisitRecord } from '../entities/visit-record.entity';

/**
 * Computes the next state of a record from its freshly loaded state.
 *
 * Must be synchronous. Return the same instance for a no-op, or throw a
 * VisitError to abort without writing.
 */
export type VisitMutator = (current: VisitRecord) => VisitRecord;

/**
 * Credential store: visit token → visit record.
 *
 * update() is the only way to change a stored record and the single
 * serialization point for the lifecycle. Competing updates on one token are
 * linearized; a caller whose write lost gets VisitUpdateConflictError right
 * away and may re-run its mutator on the new state. Different tokens never
 * contend.
 */
export abstract class VisitRepositoryPort {
  /**
   * Insert a new record. Throws VisitUpdateConflictError if the token is
   * already taken; never overwrites.
   */
  abstract create(record: VisitRecord): Promise<VisitRecord>;

  abstract findByToken(token: string): Promise<NullableType<VisitRecord>>;

  /**
   * Atomic read-modify-write.
   *
   * @throws VisitNotFoundError when the token is unknown
   * @throws VisitUpdateConflictError when a concurrent write won
   * @throws InvalidVisitTransitionError when the mutator rewrites an
   *   immutable field or reverts a lifecycle flag
   */
  abstract update(token: string, mutator: VisitMutator): Promise<VisitRecord>;

  abstract healthCheck(): Promise<boolean>;
}
