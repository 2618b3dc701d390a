import dotenv from 'dotenv';
import type {MongoClientOptions} from 'mongodb';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  const value = raw ? parseInt(raw, 10) : NaN;
  return Number.isFinite(value) ? value : fallback;
}

const baseOptions: MongoClientOptions = {
  maxPoolSize: intFromEnv('MONGODB_MAX_POOL_SIZE', 10),
  minPoolSize: intFromEnv('MONGODB_MIN_POOL_SIZE', 0),
  connectTimeoutMS: intFromEnv('MONGODB_CONNECT_TIMEOUT_MS', 10000),
  serverSelectionTimeoutMS: intFromEnv(
    'MONGODB_SERVER_SELECTION_TIMEOUT_MS',
    5000,
  ),
  socketTimeoutMS: intFromEnv('MONGODB_SOCKET_TIMEOUT_MS', 45000),
  retryWrites: true,
};

/** Hides the user:password part of a connection string. */
export function maskMongoUri(uri: string): string {
  return uri.replace(/\/\/[^:/]+:[^@]+@/, '//***:***@');
}

/**
 * MongoDB connection settings, read from the environment.
 */
export const dbConfig = {
  uri: process.env.MONGODB_URI || 'mongodb://localhost:27017',
  dbName: process.env.MONGODB_DB_NAME || 'inbox-event-sync',
  get options(): MongoClientOptions {
    const isAtlas = this.uri.startsWith('mongodb+srv://');
    return {
      ...baseOptions,
      // Atlas (mongodb+srv://) requires TLS
      ...(isAtlas && {tls: true, tlsAllowInvalidCertificates: false}),
    };
  },
};

/**
 * Checks the URI scheme and database name.
 * @throws Error if configuration is invalid
 */
export function validateDbConfig(config: {uri: string; dbName: string} = dbConfig): void {
  if (!config.uri) {
    throw new Error('MONGODB_URI environment variable is required');
  }

  if (!config.dbName) {
    throw new Error('MONGODB_DB_NAME environment variable is required');
  }

  const uriRegex = /^mongodb(\+srv)?:\/\/.+/;
  if (!uriRegex.test(config.uri)) {
    throw new Error(
      'Invalid MongoDB URI format. Expected mongodb:// or mongodb+srv://',
    );
  }
}
