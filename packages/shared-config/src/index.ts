/**
 * Centralized Configuration System
 *
 * Single source of truth for all AUDIT_* environment variables.
 * Provides type-safe, validated configuration with:
 * - Schema validation via Zod
 * - Type normalization (numbers, lists, enums)
 * - .env loading outside production
 */

export {
  loadConfig,
  printConfig,
  clearConfigCache,
  getConfigValue,
  parseEnvFile,
  type Config,
  type ConfigOptions,
} from './loader.js';
export { configSchema, type ConfigSchema } from './schema.js';
