/**
 * Configuration & Environment Management
 *
 * Separates configuration from code: defaults, a JSON file and environment
 * variables, validated once at load time.
 */

export {
  Config,
  ConfigSchema,
  configFromEnv,
  loadConfig,
  mergeConfig,
  type ConfigOptions,
  type ConfigValues,
} from './config.ts';
