import { VisitUpdateConflictError } from '../errors/visit.errors';

/**
 * Re-run an optimistic write that lost a race, up to maxAttempts in total.
 *
 * The operation must reload state on each attempt (VisitRepositoryPort.update
 * does), so the retry sees the winner's write and usually ends in a typed
 * domain error such as ALREADY_CONFIRMED rather than another conflict.
 */
export async function retryOnConflict<T>(
  operation: () => Promise<T>,
  maxAttempts: number,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof VisitUpdateConflictError) || attempt >= maxAttempts) {
        throw error;
      }
    }
  }
}
