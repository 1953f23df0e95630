/**
 * PostgreSQL storage for users, subscriptions, favorites and processed webhook events.
 *
 * Lifecycle: Call initPool() before any operations, closePool() during shutdown.
 * All functions throw if pool not initialized. Get/update functions return null if the row is not found.
 */

import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { Favorite, Subscription, SubscriptionStatus, User } from '../common/types/index.js';
import type { PostgresConfig } from '../config.js';
import {
  AccountStore,
  DuplicateEmailError,
  DuplicateFavoriteError,
  NewSubscription,
  NewUser,
  SubscriptionUpdate,
  UserUpdate,
} from './account_store.js';

let pool: pg.Pool | null = null;

type Column = string | number | boolean | Date | null;

/** Columns callers may write (id, created_at and updated_at are managed here). */
const TABLE_FIELDS: Record<string, ReadonlySet<string>> = {
  users: new Set(['email', 'name', 'role', 'password_hash', 'is_active', 'stripe_customer_id']),
  subscriptions: new Set([
    'user_id',
    'user_email',
    'plan',
    'status',
    'provider',
    'provider_subscription_id',
    'starts_at',
    'ends_at',
  ]),
};

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

/**
 * Keep only writable columns that are set.
 */
function filterFields(tableName: string, item: Record<string, Column | undefined>): Record<string, Column> {
  const allowedFields = TABLE_FIELDS[tableName];
  if (!allowedFields) {
    throw new Error(`Unknown table: ${tableName}`);
  }
  const filtered: Record<string, Column> = {};
  for (const [key, value] of Object.entries(item)) {
    if (allowedFields.has(key) && value !== undefined) {
      filtered[key] = value;
    }
  }
  return filtered;
}

/**
 * Initialize connection pool. Must be called before any database operations.
 * Uses the connection string if set, otherwise the individual host/database/user settings.
 */
export function initPool(config: PostgresConfig): void {
  const poolConfig = {
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  };

  if (config.connectionString) {
    pool = new pg.Pool({
      connectionString: config.connectionString,
      ...poolConfig,
    });
  } else {
    pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      ...poolConfig,
    });
  }

  pool.on('error', (err) => {
    console.error('Unexpected error on idle database client', err);
  });
}

export async function query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initPool() first.');
  }
  try {
    return await pool.query<T>(text, params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('Connection terminated')) {
      throw new Error(`Database connection error: ${error.message}. Please check database connectivity.`);
    }
    throw error;
  }
}

/**
 * Create tables and indexes. Safe to call multiple times (uses IF NOT EXISTS).
 * Call during application startup.
 */
export async function createSchema(): Promise<void> {
  await query(`
    CREATE TABLE IF NOT EXISTS users (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      email VARCHAR(255) NOT NULL UNIQUE,
      name VARCHAR(255) NOT NULL,
      role VARCHAR(16) NOT NULL DEFAULT 'user',
      password_hash TEXT NOT NULL,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      stripe_customer_id VARCHAR(255),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`);

  await query(`
    CREATE TABLE IF NOT EXISTS subscriptions (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id UUID REFERENCES users(id),
      user_email VARCHAR(255),
      plan VARCHAR(32) NOT NULL DEFAULT 'premium',
      status VARCHAR(16) NOT NULL,
      provider VARCHAR(32) NOT NULL DEFAULT 'stripe',
      provider_subscription_id VARCHAR(255),
      starts_at TIMESTAMPTZ NOT NULL,
      ends_at TIMESTAMPTZ NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`);

  await query(`
    CREATE TABLE IF NOT EXISTS favorites (
      user_id UUID NOT NULL REFERENCES users(id),
      listing_id VARCHAR(64) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (user_id, listing_id)
    )`);

  await query(`
    CREATE TABLE IF NOT EXISTS webhook_events (
      id VARCHAR(255) PRIMARY KEY,
      type VARCHAR(128) NOT NULL,
      received_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`);

  await query(`CREATE INDEX IF NOT EXISTS idx_users_stripe_customer_id ON users(stripe_customer_id)`);
  await query(`CREATE INDEX IF NOT EXISTS idx_subscriptions_user_id_created ON subscriptions(user_id, created_at DESC)`);
  await query(`CREATE INDEX IF NOT EXISTS idx_subscriptions_provider_id ON subscriptions(provider_subscription_id)`);
}

/**
 * Close the connection pool and release all connections. Call during graceful shutdown.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

// Generic helpers

async function getById<T extends QueryResultRow>(tableName: string, id: string): Promise<T | null> {
  const result = await query<T>(`SELECT * FROM ${tableName} WHERE id = $1`, [id]);
  return result.rows[0] ?? null;
}

async function createEntity<T extends QueryResultRow>(
  tableName: string,
  item: Record<string, Column | undefined>
): Promise<T> {
  const filteredItem = filterFields(tableName, item);
  const fields = Object.keys(filteredItem);
  const values = fields.map((field) => filteredItem[field]);
  const placeholders = fields.map((_, i) => `$${i + 1}`).join(', ');
  const result = await query<T>(
    `INSERT INTO ${tableName} (${fields.join(', ')}) VALUES (${placeholders}) RETURNING *`,
    values
  );
  return result.rows[0];
}

async function updateEntity<T extends QueryResultRow>(
  tableName: string,
  id: string,
  item: Record<string, Column | undefined>
): Promise<T | null> {
  const filteredItem = filterFields(tableName, item);
  const fields = Object.keys(filteredItem);
  if (fields.length === 0) {
    return getById<T>(tableName, id);
  }
  const values = fields.map((field) => filteredItem[field]);
  const setClause = fields.map((field, i) => `${field} = $${i + 1}`).join(', ');
  const idParam = `$${fields.length + 1}`;
  const result = await query<T>(
    `UPDATE ${tableName} SET ${setClause}, updated_at = NOW() WHERE id = ${idParam} RETURNING *`,
    [...values, id]
  );
  return result.rows[0] ?? null;
}

// Users

export async function createUser(user: NewUser): Promise<User> {
  try {
    return await createEntity<User>('users', { ...user, is_active: user.is_active ?? true });
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateEmailError(user.email);
    }
    throw error;
  }
}

export async function getUser(id: string): Promise<User | null> {
  return getById<User>('users', id);
}

export async function getUserByEmail(email: string): Promise<User | null> {
  const result = await query<User>(`SELECT * FROM users WHERE email = $1`, [email]);
  return result.rows[0] ?? null;
}

export async function getUserByStripeCustomerId(customerId: string): Promise<User | null> {
  const result = await query<User>(`SELECT * FROM users WHERE stripe_customer_id = $1 LIMIT 1`, [customerId]);
  return result.rows[0] ?? null;
}

export async function updateUser(id: string, updates: UserUpdate): Promise<User | null> {
  return updateEntity<User>('users', id, updates);
}

// Subscriptions

export async function createSubscription(subscription: NewSubscription): Promise<Subscription> {
  return createEntity<Subscription>('subscriptions', subscription);
}

export async function getLatestSubscription(userId: string, status?: SubscriptionStatus): Promise<Subscription | null> {
  const params: unknown[] = [userId];
  let sql = `SELECT * FROM subscriptions WHERE user_id = $1`;
  if (status) {
    sql += ` AND status = $2`;
    params.push(status);
  }
  sql += ` ORDER BY created_at DESC LIMIT 1`;
  const result = await query<Subscription>(sql, params);
  return result.rows[0] ?? null;
}

export async function getSubscriptionByProviderId(providerSubscriptionId: string): Promise<Subscription | null> {
  const result = await query<Subscription>(
    `SELECT * FROM subscriptions WHERE provider_subscription_id = $1 ORDER BY created_at DESC LIMIT 1`,
    [providerSubscriptionId]
  );
  return result.rows[0] ?? null;
}

export async function updateSubscription(id: string, updates: SubscriptionUpdate): Promise<Subscription | null> {
  return updateEntity<Subscription>('subscriptions', id, updates);
}

// Favorites

export async function getFavorite(userId: string, listingId: string): Promise<Favorite | null> {
  const result = await query<Favorite>(
    `SELECT * FROM favorites WHERE user_id = $1 AND listing_id = $2`,
    [userId, listingId]
  );
  return result.rows[0] ?? null;
}

export async function createFavorite(userId: string, listingId: string): Promise<Favorite> {
  try {
    const result = await query<Favorite>(
      `INSERT INTO favorites (user_id, listing_id) VALUES ($1, $2) RETURNING *`,
      [userId, listingId]
    );
    return result.rows[0];
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateFavoriteError();
    }
    throw error;
  }
}

export async function deleteFavorite(userId: string, listingId: string): Promise<boolean> {
  const result = await query(`DELETE FROM favorites WHERE user_id = $1 AND listing_id = $2`, [userId, listingId]);
  return (result.rowCount ?? 0) > 0;
}

export async function listFavorites(userId: string): Promise<Favorite[]> {
  const result = await query<Favorite>(
    `SELECT * FROM favorites WHERE user_id = $1 ORDER BY created_at ASC`,
    [userId]
  );
  return result.rows;
}

// Webhook events

export async function recordWebhookEvent(eventId: string, type: string): Promise<boolean> {
  const result = await query(
    `INSERT INTO webhook_events (id, type) VALUES ($1, $2) ON CONFLICT (id) DO NOTHING`,
    [eventId, type]
  );
  return (result.rowCount ?? 0) > 0;
}

export async function forgetWebhookEvent(eventId: string): Promise<void> {
  await query(`DELETE FROM webhook_events WHERE id = $1`, [eventId]);
}

export const sqlAccountStore: AccountStore = {
  createUser,
  getUser,
  getUserByEmail,
  getUserByStripeCustomerId,
  updateUser,
  createSubscription,
  getLatestSubscription,
  getSubscriptionByProviderId,
  updateSubscription,
  getFavorite,
  createFavorite,
  deleteFavorite,
  listFavorites,
  recordWebhookEvent,
  forgetWebhookEvent,
};
