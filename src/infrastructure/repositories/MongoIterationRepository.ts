import { injectable, inject } from 'inversify';
import { Collection } from 'mongodb';
import { Iteration } from '../../domain/entities/Iteration';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';
import { AppError } from '../../domain/errors/AppError';
import { MongoDBConnection } from '../database/MongoDBConnection';
import { logger } from '../logging/Logger';

type IterationDocument = Iteration & { savedAt: Date };

@injectable()
export class MongoIterationRepository implements IIterationRepository {
  private readonly collection: Collection<IterationDocument>;

  constructor(@inject('MongoDBConnection') dbConnection: MongoDBConnection) {
    this.collection = dbConnection.getDb().collection<IterationDocument>('iterations');
  }

  async save(iteration: Iteration): Promise<string> {
    try {
      const result = await this.collection.insertOne({ ...iteration, savedAt: new Date() });
      const key = result.insertedId.toHexString();
      logger.info('Iteration saved to MongoDB', { key, number: iteration.number });
      return key;
    } catch (error) {
      throw AppError.persistenceError('Failed to save iteration to MongoDB', error);
    }
  }
}
