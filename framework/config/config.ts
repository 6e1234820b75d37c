/**
 * Configuration Management
 *
 * Loads application configuration from defaults, a JSON file and the
 * environment. The resulting Config is owned by the Application and handed
 * to the components that need it.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigurationError } from '../errors.ts';

export const ConfigSchema = Type.Object({
  env: Type.String({ minLength: 1 }),
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
  host: Type.String({ minLength: 1 }),
  logLevel: Type.Union([
    Type.Literal('debug'),
    Type.Literal('info'),
    Type.Literal('warn'),
    Type.Literal('error'),
  ]),
  logFormat: Type.Union([Type.Literal('json'), Type.Literal('pretty')]),
  errors: Type.Object({
    mode: Type.Union([Type.Literal('debug'), Type.Literal('production')]),
  }),
  telemetry: Type.Object({
    enabled: Type.Boolean(),
    serviceName: Type.String({ minLength: 1 }),
  }),
});

export type ConfigValues = Static<typeof ConfigSchema>;

export type ConfigOptions = Partial<Omit<ConfigValues, 'errors' | 'telemetry'>> & {
  errors?: Partial<ConfigValues['errors']>;
  telemetry?: Partial<ConfigValues['telemetry']>;
};

type Env = Record<string, string | undefined>;

const DEFAULT_CONFIG_PATHS = ['config/app.json', 'config.json'];

function defaultsFor(env: string): ConfigValues {
  const production = env === 'production';
  return {
    env,
    port: 8000,
    host: '0.0.0.0',
    logLevel: 'info',
    logFormat: production ? 'json' : 'pretty',
    errors: { mode: 'production' },
    telemetry: { enabled: false, serviceName: 'switchyard' },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge configurations; undefined values in the override are skipped
 */
export function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(value) && isRecord(current) ? mergeConfig(current, value) : value;
  }

  return result;
}

function parseConfig(raw: Record<string, unknown>): ConfigValues {
  const env = typeof raw.env === 'string' ? raw.env : 'development';
  const merged = mergeConfig(defaultsFor(env), raw);

  if (!Value.Check(ConfigSchema, merged)) {
    const first = Value.Errors(ConfigSchema, merged).First();
    const where = first?.path || '/';
    throw new ConfigurationError(
      'INVALID_CONFIG',
      `Invalid configuration at ${where}: ${first?.message ?? 'unknown error'}`
    );
  }

  return merged;
}

/**
 * Configuration value
 */
export class Config {
  private values: ConfigValues;

  constructor(options: ConfigOptions = {}) {
    this.values = parseConfig(options);
  }

  /**
   * Build a Config from untyped input such as a parsed JSON file
   */
  static fromRecord(raw: Record<string, unknown>): Config {
    const config = new Config();
    config.values = parseConfig(raw);
    return config;
  }

  /**
   * Get a top-level configuration value
   */
  get<K extends keyof ConfigValues>(key: K): ConfigValues[K] {
    return this.values[key];
  }

  /**
   * Look up a value by dotted path, e.g. 'telemetry.serviceName'
   */
  lookup(path: string): unknown {
    return path.split('.').reduce<unknown>(
      (current, key) => (isRecord(current) ? current[key] : undefined),
      this.values
    );
  }

  has(path: string): boolean {
    return this.lookup(path) !== undefined;
  }

  /**
   * Set a top-level value; the result is validated like the initial options
   */
  set<K extends keyof ConfigValues>(key: K, value: ConfigValues[K]): void {
    this.values = parseConfig({ ...this.values, [key]: value });
  }

  get isProduction(): boolean {
    return this.values.env === 'production';
  }

  /**
   * Get all configuration
   */
  all(): ConfigValues {
    return structuredClone(this.values);
  }
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError('INVALID_CONFIG', `Config file ${path} is not valid JSON`, {
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError('INVALID_CONFIG', `Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Configuration read from environment variables
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  const flag = (value: string | undefined) =>
    value === undefined ? undefined : value === 'true' || value === '1';

  return {
    env: env.NODE_ENV,
    port: env.PORT !== undefined ? Number(env.PORT) : undefined,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    errors: { mode: env.ERROR_MODE },
    telemetry: {
      enabled: flag(env.OTEL_ENABLED),
      serviceName: env.OTEL_SERVICE_NAME,
    },
  };
}

/**
 * Load configuration from a config file and the environment.
 * Without a path, the default locations are tried in order.
 */
export async function loadConfig(configPath?: string, env: Env = process.env): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  const candidates = configPath ? [configPath] : DEFAULT_CONFIG_PATHS;
  for (const candidate of candidates) {
    const loaded = await readConfigFile(resolve(candidate));
    if (loaded) {
      fileConfig = loaded;
      break;
    }
  }

  return Config.fromRecord(mergeConfig(fileConfig, configFromEnv(env)));
}
