import { createApp } from './app';
import { container } from './container';
import { validateAndExitOnErrors } from './config/validateEnv';
import { MonitorPoliciesUseCase } from './application/useCases/MonitorPoliciesUseCase';
import { ISettlementGateway } from './domain/services/ISettlementGateway';
import { EthereumSettlementGateway } from './infrastructure/blockchain/EthereumSettlementGateway';
import { MongoDBConnection } from './infrastructure/database/MongoDBConnection';
import { GracefulShutdown } from './infrastructure/GracefulShutdown';
import { logger } from './infrastructure/logging/Logger';

const PORT = parseInt(process.env.PORT || '3000', 10);
const HOST = process.env.HOST || '0.0.0.0';
const MONITORING_INTERVAL = parseInt(process.env.MONITORING_INTERVAL || '60000', 10);

let monitoringIntervalId: NodeJS.Timeout | null = null;

async function startServer() {
  validateAndExitOnErrors();

  try {
    // Initialize MongoDB connection if enabled
    if (process.env.USE_MONGODB === 'true') {
      logger.info('Connecting to MongoDB...');
      const mongoConnection = container.get<MongoDBConnection>('MongoDBConnection');
      await mongoConnection.connect();
    }

    const app = createApp();

    const server = app.listen(PORT, HOST, () => {
      logger.info(`Flight delay oracle running on port ${PORT}`, {
        host: HOST,
        environment: process.env.NODE_ENV || 'development',
        mongodb: process.env.USE_MONGODB === 'true' ? 'enabled' : 'disabled',
        settlement: process.env.SETTLEMENT_MODE || 'memory'
      });
    });

    // Tune timeouts for common LBs (avoid abrupt disconnects)
    server.keepAliveTimeout = 55000;
    server.headersTimeout = 60000;
    server.requestTimeout = 30000;

    const gracefulShutdown = new GracefulShutdown(server);

    gracefulShutdown.registerShutdownCallback(async () => {
      logger.info('Stopping policy monitoring...');
      if (monitoringIntervalId) {
        clearInterval(monitoringIntervalId);
      }
    });

    gracefulShutdown.registerShutdownCallback(async () => {
      const gateway = container.get<ISettlementGateway>('ISettlementGateway');
      if (gateway instanceof EthereumSettlementGateway) {
        logger.info('Cleaning up settlement provider...');
        gateway.cleanup();
      }
    });

    gracefulShutdown.registerShutdownCallback(async () => {
      if (process.env.USE_MONGODB === 'true') {
        logger.info('Disconnecting from MongoDB...');
        const mongoConnection = container.get<MongoDBConnection>('MongoDBConnection');
        await mongoConnection.disconnect();
      }
    });

    startPolicyMonitoring();
  } catch (error) {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : 'Unknown error' });
    throw error;
  }
}

function startPolicyMonitoring() {
  const monitorUseCase = container.get<MonitorPoliciesUseCase>('MonitorPoliciesUseCase');

  logger.info(`Starting policy monitoring with interval: ${MONITORING_INTERVAL}ms`);

  const sweep = () => {
    monitorUseCase.execute().catch((error: unknown) =>
      logger.error('Monitoring error', { error: error instanceof Error ? error.message : 'Unknown error' })
    );
  };

  monitoringIntervalId = setInterval(sweep, MONITORING_INTERVAL);

  // Execute once immediately
  sweep();
}

startServer().catch((error: unknown) => {
  logger.error('Server startup failed', { error: error instanceof Error ? error.message : 'Unknown error' });
  process.exit(1);
});
