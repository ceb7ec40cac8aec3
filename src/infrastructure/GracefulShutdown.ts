import { Server } from 'http';
import { logger, errorMessage } from './logging/Logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

export class GracefulShutdown {
  private shutdownCallbacks: Array<() => Promise<void>> = [];
  private isShuttingDown = false;

  constructor(private server: Server) {
    this.setupSignalHandlers();
  }

  private setupSignalHandlers(): void {
    process.on('SIGTERM', () => void this.shutdown('SIGTERM'));
    process.on('SIGINT', () => void this.shutdown('SIGINT'));
    process.on('uncaughtException', error => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      void this.shutdown('uncaughtException');
    });
    process.on('unhandledRejection', reason => {
      logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
      void this.shutdown('unhandledRejection');
    });
  }

  public registerShutdownCallback(callback: () => Promise<void>): void {
    this.shutdownCallbacks.push(callback);
  }

  private async shutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      logger.info('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`);

    const shutdownTimeout = setTimeout(() => {
      logger.error('Graceful shutdown timeout, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      logger.info('Closing HTTP server');
      await new Promise<void>((resolve, reject) => {
        this.server.close(err => {
          if (err) {
            logger.error('Error closing server', { error: err.message });
            reject(err);
          } else {
            logger.info('HTTP server closed');
            resolve();
          }
        });
      });

      logger.info('Running shutdown callbacks');
      await Promise.all(
        this.shutdownCallbacks.map(callback =>
          callback().catch(err => logger.error('Shutdown callback error', { error: errorMessage(err) }))
        )
      );

      clearTimeout(shutdownTimeout);
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      clearTimeout(shutdownTimeout);
      process.exit(1);
    }
  }
}
