/**
 * Environment-driven configuration. Call loadConfig() once at startup (after dotenv.config()).
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  ENVIRONMENT: z.string().default('development'),
  /** comma-separated origins, used outside development */
  CORS_ALLOWED_ORIGINS: optionalString,

  DATABASE_URL: optionalString,
  PGHOST: optionalString,
  PGPORT: z.coerce.number().int().positive().optional(),
  PGDATABASE: optionalString,
  PGUSER: optionalString,
  PGPASSWORD: optionalString,
  PGSSLMODE: optionalString,

  ELASTICSEARCH_URL: z.string().default('http://localhost:9200'),
  LISTINGS_INDEX_PATTERN: z.string().default('listings-*'),

  SECRET_KEY: z.string().min(1, 'SECRET_KEY is required'),
  ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),

  STRIPE_SECRET_KEY: optionalString,
  STRIPE_PUBLISHABLE_KEY: optionalString,
  STRIPE_WEBHOOK_SECRET: optionalString,
  STRIPE_PRODUCT_ID: optionalString,
  /** where hosted checkout sends the customer back to */
  FRONTEND_URL: z
    .string()
    .default('http://localhost:3000')
    .transform((url) => url.replace(/\/+$/, '')),

  REDIS_URL: optionalString,
});

export type TokenAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface PostgresConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl: boolean;
}

export interface AppConfig {
  port: number;
  host: string;
  environment: string;
  /** true = reflect any origin */
  corsOrigins: true | string[];
  postgres: PostgresConfig;
  elasticsearchUrl: string;
  listingsIndexPattern: string;
  token: {
    secret: string;
    algorithm: TokenAlgorithm;
    ttlMinutes: number;
  };
  stripe: {
    secretKey?: string;
    publishableKey?: string;
    webhookSecret?: string;
    productId?: string;
  };
  /** web app base URL, no trailing slash */
  frontendUrl: string;
  redisUrl?: string;
}

export function corsOriginsFor(environment: string, allowList: string | undefined): true | string[] {
  if (environment === 'development') {
    return true;
  }
  if (!allowList) {
    return [];
  }
  return allowList
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
}

/**
 * @throws Error listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    environment: e.ENVIRONMENT,
    corsOrigins: corsOriginsFor(e.ENVIRONMENT, e.CORS_ALLOWED_ORIGINS),
    postgres: {
      connectionString: e.DATABASE_URL,
      host: e.PGHOST,
      port: e.PGPORT,
      database: e.PGDATABASE,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      ssl: e.PGSSLMODE === 'require',
    },
    elasticsearchUrl: e.ELASTICSEARCH_URL,
    listingsIndexPattern: e.LISTINGS_INDEX_PATTERN,
    token: {
      secret: e.SECRET_KEY,
      algorithm: e.ALGORITHM,
      ttlMinutes: e.ACCESS_TOKEN_EXPIRE_MINUTES,
    },
    stripe: {
      secretKey: e.STRIPE_SECRET_KEY,
      publishableKey: e.STRIPE_PUBLISHABLE_KEY,
      webhookSecret: e.STRIPE_WEBHOOK_SECRET,
      productId: e.STRIPE_PRODUCT_ID,
    },
    frontendUrl: e.FRONTEND_URL,
    redisUrl: e.REDIS_URL,
  };
}
