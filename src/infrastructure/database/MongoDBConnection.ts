import { MongoClient, Db, MongoClientOptions } from 'mongodb';
import { injectable } from 'inversify';
import { logger, errorMessage } from '../logging/Logger';

export const DEFAULT_DB_NAME = 'marketing_council';

@injectable()
export class MongoDBConnection {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  async connect(): Promise<void> {
    if (this.client && this.db) {
      return;
    }

    const uri = (process.env.MONGODB_URI || '').trim() || 'mongodb://localhost:27017';
    if (!/^(mongodb:\/\/|mongodb\+srv:\/\/)/.test(uri)) {
      throw new Error('Invalid scheme, expected connection string to start with "mongodb://" or "mongodb+srv://"');
    }
    const dbName = process.env.MONGODB_DB_NAME || DEFAULT_DB_NAME;

    const options: MongoClientOptions = {
      appName: 'marketing-council',
      maxPoolSize: 5,
      serverSelectionTimeoutMS: 30000,
      retryWrites: true,
      w: 'majority'
    };

    try {
      this.client = new MongoClient(uri, options);
      await this.client.connect();
      this.db = this.client.db(dbName);

      this.client.on('error', error => {
        logger.error('MongoDB connection error', { error: error.message });
      });

      logger.info('Connected to MongoDB', { dbName });
    } catch (error) {
      logger.error('Failed to connect to MongoDB', { error: errorMessage(error) });
      this.client = null;
      this.db = null;
      throw error;
    }
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error('Database not connected');
    }
    return this.db;
  }

  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }
    try {
      await this.client.close();
      logger.info('Disconnected from MongoDB gracefully');
    } catch (error) {
      logger.warn('Error during graceful disconnect', { error: errorMessage(error) });
    } finally {
      this.client = null;
      this.db = null;
    }
  }
}
