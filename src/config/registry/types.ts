/**
 * Config Registry Type Definitions
 *
 * Provides metadata-driven configuration with Zod validation.
 * Each config option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for common env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'number' // parseFloat
  | 'int' // parseInt
  | 'path' // Resolve relative to data dir
  | 'optionalPath' // Like 'path', but empty means disabled
  | 'stringArray' // CSV parsing
  | 'duration' // '15m', '2h', '1d', plain ms
  | 'timestamp'; // ISO date or epoch ms

/**
 * Custom parser function type
 */
export type CustomParser<T> = (envValue: string | undefined, defaultValue: T) => T;

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'DEDUP_STORE_PATH') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  /** Description for documentation */
  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type or custom parser function */
  parse?: ParserType | CustomParser<T>;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];

  /** Whether this is a sensitive value (passwords, keys) - hidden in docs */
  sensitive?: boolean;
}

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'scan', 'store') */
  name: string;

  /** Section description for documentation */
  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;
}

// =============================================================================
// CONFIG REGISTRY TYPE
// =============================================================================

/**
 * Complete registry of all configuration options
 */
export interface ConfigRegistry {
  /** Top-level options */
  topLevel: Record<string, ConfigOptionMeta>;

  /** Nested sections (e.g., scan, store, retry) */
  sections: Record<string, ConfigSectionMeta>;
}
