/**
 * Centralized configuration module for dedupe-scanner
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Optionally add parse: 'int' | 'boolean' | 'path' | custom function
 *   4. Add the option to the section schema below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.store.path);
 */

import { z } from 'zod';
import {
  configRegistry,
  buildConfigFromRegistry,
  validateConfig,
  loggingSection,
  scanSection,
  storeSection,
  retrySection,
  pathsSection,
  runtimeSection,
} from './registry/index.js';
import { projectRoot } from './registry/parsers.js';

// =============================================================================
// CONFIGURATION SCHEMA
// =============================================================================

const { options: logging } = loggingSection;
const { options: scan } = scanSection;
const { options: store } = storeSection;
const { options: retry } = retrySection;
const { options: paths } = pathsSection;
const { options: runtime } = runtimeSection;

const configSchema = z.object({
  logging: z.object({
    level: logging.level.schema,
    pretty: logging.pretty.schema,
  }),
  scan: z.object({
    fields: scan.fields.schema,
    hashAlgorithm: scan.hashAlgorithm.schema,
    windowLengthMs: scan.windowLengthMs.schema,
    overlapMs: scan.overlapMs.schema,
    from: scan.from.schema,
    to: scan.to.schema,
    mode: scan.mode.schema,
    verify: scan.verify.schema,
    verifyIgnoreFields: scan.verifyIgnoreFields.schema,
    tieBreak: scan.tieBreak.schema,
    pageSize: scan.pageSize.schema,
    deleteConcurrency: scan.deleteConcurrency.schema,
    maxIndexEntries: scan.maxIndexEntries.schema,
  }),
  store: z.object({
    path: store.path.schema,
    timeoutMs: store.timeoutMs.schema,
    busyTimeoutMs: store.busyTimeoutMs.schema,
  }),
  retry: z.object({
    maxAttempts: retry.maxAttempts.schema,
    initialDelayMs: retry.initialDelayMs.schema,
    maxDelayMs: retry.maxDelayMs.schema,
    backoffMultiplier: retry.backoffMultiplier.schema,
  }),
  paths: z.object({
    dataDir: paths.dataDir.schema,
    auditLog: paths.auditLog.schema,
    checkpoint: paths.checkpoint.schema,
  }),
  runtime: z.object({
    nodeEnv: runtime.nodeEnv.schema,
    projectRoot: runtime.projectRoot.schema,
  }),
});

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export type Config = z.infer<typeof configSchema>;

/**
 * Build configuration from registry metadata.
 * This is the single source of truth - all env var definitions live in the registry.
 *
 * @throws ConfigurationInvalidError when an environment value fails its schema
 */
export function buildConfig(): Config {
  const raw = buildConfigFromRegistry(configRegistry);
  const config = validateConfig(raw, configSchema);

  // Add runtime values
  config.runtime.projectRoot = projectRoot;

  return config;
}

// Create the singleton config instance
export const config: Config = buildConfig();

/**
 * Reload configuration from environment variables.
 * WARNING: This mutates the config object. Only use in tests.
 * Prefer using snapshotConfig/restoreConfig for test isolation.
 */
export function reloadConfig(): void {
  assignSections(buildConfig());
}

function assignSections(source: Config): void {
  Object.assign(config.logging, source.logging);
  Object.assign(config.scan, source.scan);
  Object.assign(config.store, source.store);
  Object.assign(config.retry, source.retry);
  Object.assign(config.paths, source.paths);
  Object.assign(config.runtime, source.runtime);
}

// =============================================================================
// TEST UTILITIES - Config snapshot and restore for test isolation
// =============================================================================

/**
 * Create a snapshot of the current config state.
 * Use with restoreConfig() for test isolation.
 */
export function snapshotConfig(): Config {
  return structuredClone(config);
}

/**
 * Restore config from a previously saved snapshot.
 * Does NOT modify environment variables - only the config object.
 */
export function restoreConfig(snapshot: Config): void {
  assignSections(snapshot);
}

/**
 * Run a test function with temporary environment variable overrides.
 * Automatically saves config state, applies env changes, and restores on completion.
 *
 * @param envOverrides - Environment variables to set (use undefined to delete)
 * @param testFn - Test function to run
 * @returns The result of testFn
 *
 * @example
 * await withTestEnv({ DEDUP_FIELDS: 'title,host' }, async () => {
 *   expect(config.scan.fields).toEqual(['title', 'host']);
 * });
 */
export async function withTestEnv<T>(
  envOverrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const configSnapshot = snapshotConfig();
  const envSnapshot: Record<string, string | undefined> = {};

  // Save original env values
  for (const key of Object.keys(envOverrides)) {
    envSnapshot[key] = process.env[key];
  }

  try {
    // Apply env overrides
    for (const [key, value] of Object.entries(envOverrides)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    // Reload config with new env values
    reloadConfig();

    // Run test
    return await testFn();
  } finally {
    // Restore original env values
    for (const [key, value] of Object.entries(envSnapshot)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }

    // Restore config (don't rely on reloadConfig since env might have side effects)
    restoreConfig(configSnapshot);
  }
}

// Re-export registry for documentation generation
export { configRegistry } from './registry/index.js';
export { getAllEnvVars } from './registry/schema-builder.js';

export default config;
