import {Db, MongoClient} from 'mongodb';
import {dbConfig, maskMongoUri, validateDbConfig} from './config.js';

function errorCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const {code} = error;
    return typeof code === 'string' || typeof code === 'number' ? code : undefined;
  }
  return undefined;
}

/**
 * Singleton managing the MongoDB client. Concurrent callers of connect()
 * share one in-flight connection attempt.
 */
export class DatabaseConnection {
  private static instance: DatabaseConnection;
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private connectionPromise: Promise<Db> | null = null;

  private constructor() {}

  public static getInstance(): DatabaseConnection {
    if (!DatabaseConnection.instance) {
      DatabaseConnection.instance = new DatabaseConnection();
    }
    return DatabaseConnection.instance;
  }

  /**
   * Returns the connected database, connecting first if needed.
   * @throws Error if configuration is invalid or every attempt fails
   */
  public async connect(): Promise<Db> {
    if (this.db) {
      return this.db;
    }

    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    this.connectionPromise = this.establishConnection();
    try {
      this.db = await this.connectionPromise;
      return this.db;
    } finally {
      this.connectionPromise = null;
    }
  }

  /**
   * Connects with exponential backoff: up to 3 attempts, waiting 2s then 4s.
   */
  private async establishConnection(): Promise<Db> {
    try {
      validateDbConfig();
    } catch (configError) {
      const errorMessage =
        configError instanceof Error
          ? configError.message
          : 'Invalid database configuration';
      console.error(
        '[Database Connection] Configuration validation failed:',
        errorMessage,
      );
      throw new Error(`Database configuration error: ${errorMessage}`);
    }

    const maxRetries = 3;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        console.log(
          `[Database Connection] [${new Date().toISOString()}] Connecting to MongoDB (attempt ${attempt}/${maxRetries})`,
          {uri: maskMongoUri(dbConfig.uri), dbName: dbConfig.dbName},
        );

        if (!this.client) {
          this.client = new MongoClient(dbConfig.uri, dbConfig.options);
          this.setupEventListeners(this.client);
        }
        await this.client.connect();

        const db = this.client.db(dbConfig.dbName);
        const pingStart = Date.now();
        await db.admin().ping();

        console.log(
          `[Database Connection] [${new Date().toISOString()}] Connected to MongoDB (ping ${Date.now() - pingStart}ms)`,
        );
        return db;
      } catch (error) {
        lastError = error;
        console.error(
          `[Database Connection] [${new Date().toISOString()}] MongoDB connection attempt ${attempt} failed:`,
          {
            attempt,
            errorType:
              error instanceof Error ? error.constructor.name : typeof error,
            message: error instanceof Error ? error.message : String(error),
            code: errorCode(error),
          },
        );

        if (attempt < maxRetries) {
          const waitTime = Math.pow(2, attempt) * 1000;
          console.log(`[Database Connection] Retrying in ${waitTime / 1000}s...`);
          await new Promise(resolve => setTimeout(resolve, waitTime));
        }
      }
    }

    await this.closeClient();
    throw new Error(
      `Failed to connect to MongoDB after ${maxRetries} attempts: ${
        lastError instanceof Error ? lastError.message : 'Unknown error'
      }`,
    );
  }

  private setupEventListeners(client: MongoClient): void {
    client.on('serverHeartbeatFailed', event => {
      console.warn('[Database Connection] Server heartbeat failed:', {
        connectionId: event.connectionId,
        failure: event.failure.message,
      });
    });

    client.on('close', () => {
      console.log('[Database Connection] MongoDB connection closed');
      this.db = null;
    });
  }

  private async closeClient(): Promise<void> {
    if (!this.client) {
      return;
    }
    try {
      await this.client.close();
    } catch (closeError) {
      console.error(
        '[Database Connection] Error closing MongoDB client:',
        closeError instanceof Error ? closeError.message : closeError,
      );
    }
    this.client = null;
    this.db = null;
  }

  public isConnected(): boolean {
    return this.db !== null && this.client !== null;
  }

  public async disconnect(): Promise<void> {
    if (this.client) {
      console.log('[Database Connection] Disconnecting from MongoDB...');
      await this.client.close();
      this.client = null;
      this.db = null;
      console.log('[Database Connection] Disconnected from MongoDB');
    }
  }

  /**
   * Pings the database. A lost connection is dropped so the next connect()
   * starts over.
   */
  public async healthCheck(): Promise<boolean> {
    if (!this.db || !this.client) {
      console.warn('[Database Connection] Health check failed: not connected');
      return false;
    }

    try {
      const pingStart = Date.now();
      await this.db.admin().ping();
      const pingDuration = Date.now() - pingStart;
      if (pingDuration > 1000) {
        console.warn(
          `[Database Connection] Health check ping took ${pingDuration}ms (slow)`,
        );
      }
      return true;
    } catch (error) {
      console.error('[Database Connection] Health check failed:', {
        errorType: error instanceof Error ? error.constructor.name : typeof error,
        message: error instanceof Error ? error.message : String(error),
        code: errorCode(error),
      });
      await this.closeClient();
      return false;
    }
  }
}

const dbConnection = DatabaseConnection.getInstance();

export const connect = (): Promise<Db> => dbConnection.connect();

export const isConnected = (): boolean => dbConnection.isConnected();

export const disconnect = (): Promise<void> => dbConnection.disconnect();

export const healthCheck = (): Promise<boolean> => dbConnection.healthCheck();
