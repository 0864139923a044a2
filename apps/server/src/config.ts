import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const CONFIG_ENV_VAR = 'TASKLANE_CONFIG';
export const DEFAULT_CONFIG_FILES = ['config.yaml', 'config.yaml.example'] as const;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export const LOG_FORMATS = ['pretty', 'json'] as const;

export const configSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8000),
    basePath: z.string().startsWith('/').default('/task/v1'),
  }).strict().default({}),
  database: z.object({
    path: z.string().min(1).default('./data/tasks.db'),
  }).strict().default({}),
  auth: z.object({
    tokens: z.array(z.string().min(1)).min(1, 'At least one token is required'),
  }).strict(),
  log: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    format: z.enum(LOG_FORMATS).default('pretty'),
  }).strict().default({}),
}).strict();

export type AppConfig = z.output<typeof configSchema>;
export type LogLevel = AppConfig['log']['level'];
export type LogFormat = AppConfig['log']['format'];

export class ConfigError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Explicit path (`--config`); wins over the environment and the defaults */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Absolute path of the file the config was read from */
  source: string;
}

/** The first existing config file in search order */
export function findConfigFile(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = options.configPath ?? env[CONFIG_ENV_VAR];
  if (explicit) {
    const path = resolve(cwd, explicit);
    if (!existsSync(path)) throw new ConfigError('Config file not found', path);
    return path;
  }

  for (const name of DEFAULT_CONFIG_FILES) {
    const path = resolve(cwd, name);
    if (existsSync(path)) return path;
  }
  throw new ConfigError(`No config file found (looked for ${DEFAULT_CONFIG_FILES.join(', ')} in ${cwd})`);
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid TASKLANE_PORT '${raw}'`);
  }
  return port;
}

function resolveDbPath(base: string, path: string): string {
  return path === ':memory:' ? path : resolve(base, path);
}

/** Apply TASKLANE_HOST, TASKLANE_PORT and TASKLANE_DB (relative to `cwd`) over the file's values */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv, cwd = process.cwd()): AppConfig {
  const host = env.TASKLANE_HOST?.trim() || config.server.host;
  const port = env.TASKLANE_PORT ? parsePort(env.TASKLANE_PORT) : config.server.port;
  const dbPath = env.TASKLANE_DB ? resolveDbPath(cwd, env.TASKLANE_DB) : config.database.path;
  return {
    ...config,
    server: { ...config.server, host, port },
    database: { ...config.database, path: dbPath },
  };
}

/** Validate a parsed YAML document; `source` only labels errors */
export function parseConfig(document: unknown, source?: string): AppConfig {
  const result = configSchema.safeParse(document ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${details}`, source);
  }
  return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const source = findConfigFile(options);

  let document: unknown;
  try {
    document = parseYaml(readFileSync(source, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read config: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  const fromFile = parseConfig(document, source);
  // A relative database path in the file is relative to the file's directory
  const config: AppConfig = {
    ...fromFile,
    database: { path: resolveDbPath(dirname(source), fromFile.database.path) },
  };

  return {
    config: applyEnvOverrides(config, env, options.cwd ?? process.cwd()),
    source,
  };
}
