import { MongoClient, Db, MongoClientOptions } from 'mongodb';
import { injectable } from 'inversify';
import { logger } from '../logging/Logger';

@injectable()
export class MongoDBConnection {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private isConnecting = false;

  async connect(): Promise<void> {
    if (this.isConnecting) {
      logger.debug('Connection already in progress, waiting...');
      return;
    }

    if (this.client && this.db) {
      try {
        await this.client.db('admin').admin().ping();
        logger.debug('Existing MongoDB connection is healthy');
        return;
      } catch (error) {
        logger.warn('Existing connection unhealthy, reconnecting...', {
          error: error instanceof Error ? error.message : 'Unknown error'
        });
        await this.forceDisconnect();
      }
    }

    this.isConnecting = true;

    try {
      let uri = (process.env.MONGODB_URI || '').trim();
      if (!uri) {
        uri = 'mongodb://localhost:27017';
        logger.warn('MONGODB_URI not set; falling back to localhost default.');
      }

      if (!/^(mongodb:\/\/|mongodb\+srv:\/\/)/.test(uri)) {
        throw new Error('Invalid scheme, expected connection string to start with "mongodb://" or "mongodb+srv://"');
      }
      const dbName = process.env.MONGODB_DB_NAME || 'flight_delay_oracle';

      const options: MongoClientOptions = {
        appName: process.env.MONGODB_APP_NAME || 'flight-delay-oracle',
        maxPoolSize: parseInt(process.env.MONGODB_MAX_POOL_SIZE || '5', 10),
        minPoolSize: parseInt(process.env.MONGODB_MIN_POOL_SIZE || '1', 10),
        connectTimeoutMS: parseInt(process.env.MONGODB_CONNECT_TIMEOUT_MS || '30000', 10),
        serverSelectionTimeoutMS: parseInt(process.env.MONGODB_SERVER_SELECTION_TIMEOUT_MS || '30000', 10),
        retryReads: true,
        retryWrites: true,
        w: 'majority'
      };

      this.client = new MongoClient(uri, options);
      await this.client.connect();
      this.db = this.client.db(dbName);

      this.client.on('error', (error) => {
        logger.error('MongoDB connection error', { error: error.message });
      });

      this.client.on('close', () => {
        logger.warn('MongoDB connection closed, will attempt to reconnect on next operation');
        this.client = null;
        this.db = null;
      });

      logger.info('Connected to MongoDB', { dbName });
    } catch (error) {
      logger.error('Failed to connect to MongoDB', { error: error instanceof Error ? error.message : 'Unknown error' });
      this.client = null;
      this.db = null;
      throw error;
    } finally {
      this.isConnecting = false;
    }
  }

  getDb(): Db {
    if (!this.db) {
      throw new Error('Database not connected');
    }
    return this.db;
  }

  private async forceDisconnect(): Promise<void> {
    if (this.client) {
      try {
        await this.client.close(true);
      } catch (error) {
        logger.warn('Error during force disconnect', { error: error instanceof Error ? error.message : 'Unknown error' });
      } finally {
        this.client = null;
        this.db = null;
      }
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      try {
        await this.client.close();
        logger.info('Disconnected from MongoDB gracefully');
      } catch (error) {
        logger.warn('Error during graceful disconnect', { error: error instanceof Error ? error.message : 'Unknown error' });
      } finally {
        this.client = null;
        this.db = null;
      }
    }
  }
}
