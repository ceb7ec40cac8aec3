import 'reflect-metadata';
import dotenv from 'dotenv';
import { createApp } from './app';
import { createContainer } from './container';
import { validateAndLogEnvironment } from './config/validateEnv';
import { MongoDBConnection } from './infrastructure/database/MongoDBConnection';
import { CouncilEventEmitter } from './infrastructure/council/events/CouncilEventEmitter';
import { GracefulShutdown } from './infrastructure/GracefulShutdown';
import { logger, errorMessage } from './infrastructure/logging/Logger';

dotenv.config();

const PORT = parseInt(process.env.PORT || '3000', 10);
const HOST = process.env.HOST || '0.0.0.0';
const EVENT_RETENTION_MS = 60 * 60 * 1000;

async function startServer(): Promise<void> {
  validateAndLogEnvironment();

  const container = await createContainer();
  const app = createApp(container);

  const server = app.listen(PORT, HOST, () => {
    logger.info(`Marketing council server running on port ${PORT}`, {
      host: HOST,
      environment: process.env.NODE_ENV || 'development',
      mongodb: process.env.USE_MONGODB === 'true' ? 'enabled' : 'disabled'
    });
  });

  // Iterations are long-running requests
  server.requestTimeout = 10 * 60 * 1000;

  const events = container.get<CouncilEventEmitter>('CouncilEventEmitter');
  const cleanupInterval = setInterval(() => events.cleanup(EVENT_RETENTION_MS), EVENT_RETENTION_MS);

  const gracefulShutdown = new GracefulShutdown(server);

  gracefulShutdown.registerShutdownCallback(async () => {
    clearInterval(cleanupInterval);
  });

  gracefulShutdown.registerShutdownCallback(async () => {
    if (process.env.USE_MONGODB === 'true') {
      logger.info('Disconnecting from MongoDB...');
      await container.get<MongoDBConnection>('MongoDBConnection').disconnect();
    }
  });
}

startServer().catch(error => {
  logger.error('Server startup failed', { error: errorMessage(error) });
  process.exit(1);
});
