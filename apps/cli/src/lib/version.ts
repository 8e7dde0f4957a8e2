/**
 * CLI Version - injected at build time by tsup
 *
 * @module lib/version
 */

// Build-time constants injected by tsup
declare const __CLI_VERSION__: string;
declare const __CLI_NAME__: string;

export const CLI_VERSION = typeof __CLI_VERSION__ !== 'undefined' ? __CLI_VERSION__ : '0.1.0';

export const CLI_NAME = typeof __CLI_NAME__ !== 'undefined' ? __CLI_NAME__ : 'auditor';
