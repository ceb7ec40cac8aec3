import { Iteration } from '../entities/Iteration';

export interface IIterationRepository {
  /**
   * Persists a completed iteration and returns the key of the stored record
   */
  save(iteration: Iteration): Promise<string>;
}
