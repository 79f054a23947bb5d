/**
 * Application Configuration
 *
 * Store, service and provider settings read from the environment. Worker
 * loop settings live in `worker/config.ts`.
 */

import { z } from 'zod';

import type { MongoConfig } from '../adapters/mongo';
import type { Neo4jConfig } from '../adapters/neo4j';
import type { PostgresPoolConfig } from '../adapters/postgres';
import { ConfigurationError } from '../utils/errors';
import type { LogLevel } from '../utils/logger';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export type AIProvider = 'gemini' | 'openrouter';

export interface AIConfig {
  /** Which adapter the pipeline uses (AI_PROVIDER) */
  provider: AIProvider;

  /** Per-call bound in milliseconds (AI_TIMEOUT_MS) */
  timeoutMs: number;

  gemini: {
    /** GOOGLE_GEMINI_API_KEY */
    apiKey: string | null;
    /** GEMINI_MODEL */
    model: string;
    /** GEMINI_API_BASE_URL */
    baseUrl: string;
  };

  openrouter: {
    /** OPENROUTER_API_KEY */
    apiKey: string | null;
    /** OPENROUTER_MODEL */
    model: string;
    /** OPENROUTER_BASE_URL */
    baseUrl: string;
  };
}

export interface AppConfig {
  environment: 'development' | 'test' | 'production';
  serviceName: string;
  logLevel: LogLevel;

  /** Port for the health HTTP server (HEALTH_PORT) */
  healthPort: number;

  /** Feature store; null when MONGO_DB_URL is unset */
  mongo: MongoConfig | null;

  /** Candidate store; null when POSTGRES_DSN_CANDIDATES is unset */
  candidateStore: PostgresPoolConfig | null;

  /** Package metadata database; null when POSTGRES_DSN_UDIM_METADATA is unset */
  metadataStore: PostgresPoolConfig | null;

  /** Persona knowledge graph; null when NEO4J_URI is unset */
  neo4j: Neo4jConfig | null;

  consent: {
    /** CONSENT_API_URL */
    baseUrl: string | null;
    /** CONSENT_TIMEOUT_MS */
    timeoutMs: number;
  };

  ai: AIConfig;

  aws: {
    /** AWS_REGION */
    region: string;
    /** AWS_ENDPOINT_URL, for local stacks */
    endpoint: string | null;
  };

  /** Bound applied to each store writer call (STORE_WRITE_TIMEOUT_MS) */
  storeWriteTimeoutMs: number;
}

// =============================================================================
// ENVIRONMENT SCHEMA
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : null));

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  SERVICE_NAME: z.string().default('persona-pipeline'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  MONGO_DB_URL: optionalString,
  MONGO_DATABASE_NAME: z.string().default('persona_features'),

  POSTGRES_DSN_CANDIDATES: optionalString,
  POSTGRES_DSN_UDIM_METADATA: optionalString,
  POSTGRES_POOL_MAX: z.coerce.number().int().min(1).default(10),
  POSTGRES_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  POSTGRES_SSL: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),

  NEO4J_URI: optionalString,
  NEO4J_USER: z.string().default('neo4j'),
  NEO4J_PASSWORD: optionalString,
  NEO4J_DATABASE: z.string().default('neo4j'),

  CONSENT_API_URL: optionalString,
  CONSENT_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  AI_PROVIDER: z.enum(['gemini', 'openrouter']).default('gemini'),
  AI_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60000),
  GOOGLE_GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-1.5-flash-latest'),
  GEMINI_API_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: z.string().default('openai/gpt-4o-mini'),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),

  AWS_REGION: z.string().default('us-east-1'),
  AWS_ENDPOINT_URL: optionalString,

  STORE_WRITE_TIMEOUT_MS: z.coerce.number().int().min(100).default(15000),
});

// =============================================================================
// CONFIGURATION LOADER
// =============================================================================

/**
 * Load application configuration from environment variables.
 * Unset optional stores come back as null.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }
  const e = parsed.data;

  const postgresPool = (dsn: string | null): PostgresPoolConfig | null =>
    dsn
      ? {
          dsn,
          max: e.POSTGRES_POOL_MAX,
          statementTimeoutMs: e.POSTGRES_STATEMENT_TIMEOUT_MS,
          ssl: e.POSTGRES_SSL,
        }
      : null;

  return {
    environment: e.NODE_ENV,
    serviceName: e.SERVICE_NAME,
    logLevel: e.LOG_LEVEL,
    healthPort: e.HEALTH_PORT,

    mongo: e.MONGO_DB_URL
      ? { url: e.MONGO_DB_URL, database: e.MONGO_DATABASE_NAME, timeoutMs: e.STORE_WRITE_TIMEOUT_MS }
      : null,

    candidateStore: postgresPool(e.POSTGRES_DSN_CANDIDATES),
    metadataStore: postgresPool(e.POSTGRES_DSN_UDIM_METADATA),

    neo4j:
      e.NEO4J_URI && e.NEO4J_PASSWORD
        ? {
            uri: e.NEO4J_URI,
            username: e.NEO4J_USER,
            password: e.NEO4J_PASSWORD,
            database: e.NEO4J_DATABASE,
            transactionTimeoutMs: e.STORE_WRITE_TIMEOUT_MS,
          }
        : null,

    consent: {
      baseUrl: e.CONSENT_API_URL ? e.CONSENT_API_URL.replace(/\/+$/, '') : null,
      timeoutMs: e.CONSENT_TIMEOUT_MS,
    },

    ai: {
      provider: e.AI_PROVIDER,
      timeoutMs: e.AI_TIMEOUT_MS,
      gemini: {
        apiKey: e.GOOGLE_GEMINI_API_KEY,
        model: e.GEMINI_MODEL,
        baseUrl: e.GEMINI_API_BASE_URL,
      },
      openrouter: {
        apiKey: e.OPENROUTER_API_KEY,
        model: e.OPENROUTER_MODEL,
        baseUrl: e.OPENROUTER_BASE_URL,
      },
    },

    aws: {
      region: e.AWS_REGION,
      endpoint: e.AWS_ENDPOINT_URL,
    },

    storeWriteTimeoutMs: e.STORE_WRITE_TIMEOUT_MS,
  };
}

// =============================================================================
// CONFIGURATION VALIDATION
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Missing critical settings are errors in production and warnings elsewhere,
 * so a developer can run the worker against a subset of the stores.
 */
export function validateAppConfig(config: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const critical = config.environment === 'production' ? errors : warnings;

  if (!config.metadataStore) {
    critical.push('POSTGRES_DSN_UDIM_METADATA is not set; package metadata cannot be fetched');
  }
  if (!config.consent.baseUrl) {
    critical.push('CONSENT_API_URL is not set; every consent check will be denied');
  }

  const providerKey =
    config.ai.provider === 'gemini' ? config.ai.gemini.apiKey : config.ai.openrouter.apiKey;
  if (!providerKey) {
    critical.push(`No API key configured for AI provider '${config.ai.provider}'`);
  }

  if (!config.mongo) {
    warnings.push('MONGO_DB_URL is not set; feature sets will not be persisted');
  }
  if (!config.candidateStore) {
    warnings.push('POSTGRES_DSN_CANDIDATES is not set; trait candidates will not be persisted');
  }
  if (!config.neo4j) {
    warnings.push('NEO4J_URI/NEO4J_PASSWORD are not set; the knowledge graph will not be updated');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Get a safe version of config for logging (no secrets or DSNs).
 */
export function getLoggableAppConfig(config: AppConfig): Record<string, unknown> {
  return {
    environment: config.environment,
    serviceName: config.serviceName,
    logLevel: config.logLevel,
    healthPort: config.healthPort,
    featureStore: config.mongo ? config.mongo.database : null,
    candidateStore: config.candidateStore !== null,
    metadataStore: config.metadataStore !== null,
    neo4j: config.neo4j ? config.neo4j.uri : null,
    consentService: config.consent.baseUrl,
    aiProvider: config.ai.provider,
    aiModel: config.ai.provider === 'gemini' ? config.ai.gemini.model : config.ai.openrouter.model,
    awsRegion: config.aws.region,
  };
}
