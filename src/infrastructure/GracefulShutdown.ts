import { Server } from 'http';
import { logger } from './logging/Logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

export class GracefulShutdown {
  private shutdownCallbacks: Array<() => Promise<void>> = [];
  private isShuttingDown = false;

  constructor(private server: Server) {
    this.setupSignalHandlers();
  }

  private setupSignalHandlers(): void {
    process.on('SIGTERM', () => this.handle('SIGTERM'));
    process.on('SIGINT', () => this.handle('SIGINT'));
    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      this.handle('uncaughtException');
    });
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
      this.handle('unhandledRejection');
    });
  }

  public registerShutdownCallback(callback: () => Promise<void>): void {
    this.shutdownCallbacks.push(callback);
  }

  private handle(signal: string): void {
    this.shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown crashed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
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
        this.server.close((err) => {
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
          callback().catch((err: unknown) =>
            logger.error('Shutdown callback error', { error: err instanceof Error ? err.message : String(err) })
          )
        )
      );

      clearTimeout(shutdownTimeout);
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
      clearTimeout(shutdownTimeout);
      process.exit(1);
    }
  }
}
