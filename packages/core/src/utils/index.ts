/**
 * Core Utilities Module
 *
 * Shared utilities for error handling, logging, timeouts, and locking.
 */

export * from './errors.js';
export * from './logger.js';
export * from './timeout.js';
export * from './concurrency.js';
export * from './project-lock.js';
export * from './atomic-write.js';
