import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { CANONICAL_FIELDS, type CanonicalField } from './types/record.js';

const required = () => z.string({ required_error: 'required' }).min(1, 'required');

/** Variables every entry point needs: logging, Postgres and the SQL script directories. */
const databaseEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  POSTGRES_HOST: required(),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DB: required(),
  POSTGRES_USER: required(),
  POSTGRES_PASSWORD: required(),
  POSTGRES_STAGING_TABLE: z.string().min(1).default('staging_produtos_ecommerce'),
  SCHEMA_SCRIPTS_DIR: z.string().default('sql/schema'),
  POPULATE_SCRIPTS_DIR: z.string().default('sql/populate'),
  QUERIES_DIR: z.string().default('sql/queries'),
});

const envSchema = databaseEnvSchema.extend({
  API_BASE_URL: required().url('must be a URL'),
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  REDIS_URL: z.string().url().optional(),
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  RAW_BUFFER_KEY: z.string().min(1).default('raw:sales'),
});

export type Env = z.infer<typeof envSchema>;

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

/** What the schema, population and report entry points need; no API or Redis. */
export interface DatabaseOnlyConfig {
  env: Env['NODE_ENV'];
  logLevel: Env['LOG_LEVEL'];
  database: DatabaseConfig;
  staging: { table: string; columns: readonly CanonicalField[] };
  scripts: { schemaDir: string; populateDir: string; queriesDir: string };
}

export interface PipelineConfig extends DatabaseOnlyConfig {
  api: { url: string; timeoutMs: number };
  redis: { url: string | null; host: string; port: number; key: string };
}

type EnvSource = Record<string, string | undefined>;

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: EnvSource): z.infer<S> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function databaseSection(e: z.infer<typeof databaseEnvSchema>, cwd: string): DatabaseOnlyConfig {
  return {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    database: {
      host: e.POSTGRES_HOST,
      port: e.POSTGRES_PORT,
      database: e.POSTGRES_DB,
      user: e.POSTGRES_USER,
      password: e.POSTGRES_PASSWORD,
    },
    staging: { table: e.POSTGRES_STAGING_TABLE, columns: CANONICAL_FIELDS },
    scripts: {
      schemaDir: path.resolve(cwd, e.SCHEMA_SCRIPTS_DIR),
      populateDir: path.resolve(cwd, e.POPULATE_SCRIPTS_DIR),
      queriesDir: path.resolve(cwd, e.QUERIES_DIR),
    },
  };
}

/**
 * The process environment with a `.env` file from `cwd` underneath it.
 * Variables already set win over the file; a missing file adds nothing.
 */
export function readEnvironment(
  env: EnvSource = process.env,
  cwd: string = process.cwd(),
): EnvSource {
  const file = path.join(cwd, '.env');
  if (!fs.existsSync(file)) return { ...env };
  return { ...dotenv.parse(fs.readFileSync(file)), ...env };
}

/**
 * Validate the environment once and build the config every component receives.
 * Throws ConfigError naming every missing or invalid variable.
 */
export function loadConfig(env: EnvSource = process.env, cwd: string = process.cwd()): PipelineConfig {
  const e = parseEnv(envSchema, env);

  return Object.freeze({
    ...databaseSection(e, cwd),
    api: { url: e.API_BASE_URL, timeoutMs: e.API_TIMEOUT_MS },
    redis: { url: e.REDIS_URL ?? null, host: e.REDIS_HOST, port: e.REDIS_PORT, key: e.RAW_BUFFER_KEY },
  });
}

/** Like loadConfig, but only the Postgres side is validated. */
export function loadDatabaseConfig(
  env: EnvSource = process.env,
  cwd: string = process.cwd(),
): DatabaseOnlyConfig {
  return Object.freeze(databaseSection(parseEnv(databaseEnvSchema, env), cwd));
}
