import { injectable } from 'inversify';
import { Iteration } from '../../domain/entities/Iteration';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';

@injectable()
export class InMemoryIterationRepository implements IIterationRepository {
  private readonly records = new Map<string, Iteration>();

  async save(iteration: Iteration): Promise<string> {
    const key = `iteration_${iteration.number}`;
    this.records.set(key, iteration);
    return key;
  }

  async findByKey(key: string): Promise<Iteration | null> {
    return this.records.get(key) ?? null;
  }

  get size(): number {
    return this.records.size;
  }
}
