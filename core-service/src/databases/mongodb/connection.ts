/**
 * MongoDB client lifecycle: one pooled client per process, registered
 * indexes created on connect, scoped sessions and a ping health check.
 */

import {
  MongoClient,
  ReadPreference,
  WriteConcern,
  type ClientSession,
  type Db,
  type IndexDescription,
} from 'mongodb';
import { logger } from '../../common/logger.js';
import { getErrorMessage } from '../../common/errors.js';

export interface MongoConfig {
  uri: string;
  /** Falls back to the URI path, then "default" */
  dbName?: string;
  maxPoolSize?: number;
  minPoolSize?: number;
  /** Fail a checkout instead of queueing forever when the pool is exhausted */
  waitQueueTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  readPreference?: 'primary' | 'secondary' | 'nearest';
  writeConcern?: 'majority' | number;
}

const defaults: Required<Omit<MongoConfig, 'uri' | 'dbName'>> = {
  maxPoolSize: 50,
  minPoolSize: 5,
  waitQueueTimeoutMS: 10_000,
  serverSelectionTimeoutMS: 30_000,
  readPreference: 'primary',
  writeConcern: 'majority',
};

const readPreferences = {
  primary: ReadPreference.PRIMARY,
  secondary: ReadPreference.SECONDARY_PREFERRED,
  nearest: ReadPreference.NEAREST,
} as const;

const state: { client: MongoClient | null; db: Db | null } = { client: null, db: null };

function databaseNameFrom(uri: string, explicit?: string): string {
  if (explicit?.trim()) return explicit.trim();
  const [name] = new URL(uri).pathname.replace(/^\//, '').split('?');
  return name.trim() || 'default';
}

// ═══════════════════════════════════════════════════════════════════
// Connection
// ═══════════════════════════════════════════════════════════════════

export async function connectDatabase(uri: string, options: Omit<MongoConfig, 'uri'> = {}): Promise<Db> {
  const dbName = databaseNameFrom(uri, options.dbName);

  if (state.client) {
    try {
      await state.client.db('admin').command({ ping: 1 });
      state.db = state.client.db(dbName);
      return state.db;
    } catch (error) {
      logger.warn('Existing MongoDB client unreachable, reconnecting', { error: getErrorMessage(error) });
      state.client = null;
      state.db = null;
    }
  }

  const settings = { ...defaults, ...options };
  const client = new MongoClient(uri, {
    maxPoolSize: settings.maxPoolSize,
    minPoolSize: settings.minPoolSize,
    waitQueueTimeoutMS: settings.waitQueueTimeoutMS,
    serverSelectionTimeoutMS: settings.serverSelectionTimeoutMS,
    readPreference: readPreferences[settings.readPreference],
    writeConcern: new WriteConcern(settings.writeConcern),
    retryWrites: true,
    retryReads: true,
    // Optional document fields left undefined are not stored as null
    ignoreUndefined: true,
  });

  client.on('connectionCheckOutFailed', event => {
    if (event.reason === 'timeout') {
      logger.warn('MongoDB pool exhausted', { maxPoolSize: settings.maxPoolSize });
    }
  });

  await client.connect();
  const db = client.db(dbName);
  await ensureIndexes(db);

  state.client = client;
  state.db = db;
  logger.info('Connected to MongoDB', { database: dbName, readPreference: settings.readPreference });
  return db;
}

export function getClient(): MongoClient {
  if (!state.client) throw new Error('Database not connected');
  return state.client;
}

export async function closeDatabase(): Promise<void> {
  const { client } = state;
  if (!client) return;
  state.client = null;
  state.db = null;
  await client.close();
  logger.info('MongoDB disconnected');
}

export async function checkDatabaseHealth(): Promise<{ healthy: boolean; latencyMs: number }> {
  if (!state.db) return { healthy: false, latencyMs: -1 };

  const started = Date.now();
  try {
    await state.db.command({ ping: 1 });
    return { healthy: true, latencyMs: Date.now() - started };
  } catch (error) {
    logger.warn('MongoDB ping failed', { error: getErrorMessage(error) });
    return { healthy: false, latencyMs: -1 };
  }
}

// ═══════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════

/**
 * Run `fn` with a client session, inside a transaction when asked
 * (replica sets only). The session is always ended.
 */
export async function withSession<T>(
  client: MongoClient,
  options: { transaction: boolean },
  fn: (session: ClientSession) => Promise<T>
): Promise<T> {
  const session = client.startSession();
  try {
    if (!options.transaction) return await fn(session);

    // withTransaction may retry the callback; only the committed attempt counts
    const attempts: Array<{ value: T }> = [];
    await session.withTransaction(async () => {
      attempts.push({ value: await fn(session) });
    });
    const committed = attempts.at(-1);
    if (!committed) throw new Error('Transaction aborted');
    return committed.value;
  } finally {
    await session.endSession();
  }
}

// ═══════════════════════════════════════════════════════════════════
// Indexes
// ═══════════════════════════════════════════════════════════════════

const registry = new Map<string, IndexDescription[]>();

/** Later registrations for the same collection replace earlier ones */
export function registerIndexes(collection: string, indexes: IndexDescription[]): void {
  registry.set(collection, indexes);
}

export async function ensureIndexes(db: Db): Promise<void> {
  for (const [collection, indexes] of registry) {
    try {
      await db.collection(collection).createIndexes(indexes);
    } catch (error) {
      logger.error('Failed to create indexes', { collection, error: getErrorMessage(error) });
      throw error;
    }
  }
  logger.debug('Indexes ensured', { collections: [...registry.keys()] });
}
