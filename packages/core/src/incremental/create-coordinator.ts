/**
 * Build a coordinator from the loaded configuration
 */

import { loadConfig, type Config, type ConfigOptions } from '@auditor/shared-config';
import { Logger } from '../utils/logger.js';
import { IncrementalCoordinator } from './incremental-coordinator.js';
import { ToolRegistry } from './tool-registry.js';

export interface CreateCoordinatorOptions {
  /** Defaults to an empty registry, enough for the admin surface */
  registry?: ToolRegistry;
  /** Values applied on top of the environment, e.g. CLI flags */
  overrides?: ConfigOptions['overrides'];
  /** Skip the environment and use this configuration */
  config?: Config;
  logger?: Logger;
}

export function createAuditCoordinator(
  projectRoot: string,
  options: CreateCoordinatorOptions = {}
): IncrementalCoordinator {
  const config = options.config ?? loadConfig({ overrides: options.overrides });

  const logger =
    options.logger ??
    new Logger({
      component: 'auditor',
      level: config.AUDIT_LOG_LEVEL,
      enableStructured: config.AUDIT_LOG_FORMAT === 'json',
    });

  return new IncrementalCoordinator({
    projectRoot,
    registry: options.registry ?? new ToolRegistry(),
    cacheDir: config.AUDIT_CACHE_DIR,
    includeExtensions: config.AUDIT_INCLUDE_EXTENSIONS,
    extraExcludeDirs: config.AUDIT_EXTRA_EXCLUDE_DIRS,
    patternMaxAgeMs: config.AUDIT_PATTERN_CACHE_MAX_AGE_MS,
    toolTimeoutMs: config.AUDIT_TOOL_TIMEOUT_MS,
    runTimeoutMs: config.AUDIT_TIMEOUT_MS,
    maxConcurrency: config.AUDIT_MAX_CONCURRENCY,
    lockTimeoutMs: config.AUDIT_LOCK_TIMEOUT_MS,
    logger,
  });
}
