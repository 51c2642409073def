/**
 * Zod Schema Builder
 *
 * Builds Zod validation schemas from the config registry.
 * Enables runtime validation with clear error messages.
 * Provides registry-driven config building.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import {
  parseBoolean,
  parseDurationMs,
  parseInt_,
  parseNumber,
  parseString,
  parseStringArray,
  parseTimestamp,
  resolveDataPath,
} from './parsers.js';
import { ConfigurationInvalidError } from '../../core/errors.js';

// =============================================================================
// SCHEMA BUILDING
// =============================================================================

/**
 * Build a Zod object schema for a single section
 */
export function buildSectionSchema(
  section: ConfigSectionMeta
): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, option] of Object.entries(section.options)) {
    shape[key] = option.schema;
  }

  return z.object(shape);
}

/**
 * Build a complete Zod schema from the config registry
 */
export function buildConfigSchema(
  registry: ConfigRegistry
): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};

  // Add top-level options
  for (const [key, option] of Object.entries(registry.topLevel)) {
    shape[key] = option.schema;
  }

  // Add sections
  for (const [key, section] of Object.entries(registry.sections)) {
    shape[key] = buildSectionSchema(section);
  }

  return z.object(shape);
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}

/**
 * Validate a config object against a schema.
 * Returns the validated config or throws ConfigurationInvalidError.
 */
export function validateConfig<S extends z.ZodTypeAny>(config: unknown, schema: S): z.infer<S> {
  const result = schema.safeParse(config);

  if (!result.success) {
    throw new ConfigurationInvalidError(formatZodErrors(result.error));
  }

  return result.data;
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

/**
 * Get a human-readable type string from a Zod schema.
 */
export function getZodTypeString(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional) return `${getZodTypeString(schema.unwrap())} (optional)`;
  if (schema instanceof z.ZodEnum) {
    const values: readonly string[] = schema.options;
    return values.map((v) => `\`${v}\``).join(' | ');
  }
  if (schema instanceof z.ZodArray) return `${getZodTypeString(schema.element)}[]`;
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodObject) return 'object';
  return 'unknown';
}

export interface EnvVarDoc {
  envKey: string;
  description: string;
  defaultValue: unknown;
  type: string;
  sensitive: boolean;
  section: string;
}

/**
 * Get all environment variables from the registry
 */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarDoc[] {
  const envVars: EnvVarDoc[] = [];

  // Top-level options
  for (const [, option] of Object.entries(registry.topLevel)) {
    envVars.push({
      envKey: option.envKey,
      description: option.description,
      defaultValue: option.defaultValue,
      type: getZodTypeString(option.schema),
      sensitive: option.sensitive ?? false,
      section: '(top-level)',
    });
  }

  // Section options
  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const [, option] of Object.entries(section.options)) {
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        type: getZodTypeString(option.schema),
        sensitive: option.sensitive ?? false,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from Zod schema when not explicitly specified
 */
function inferParserFromSchema(schema: z.ZodTypeAny): ParserType {
  if (schema instanceof z.ZodOptional) return inferParserFromSchema(schema.unwrap());
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodArray) return 'stringArray';
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser.
 *
 * Values that fail to parse fall back to the default; the result is
 * validated against the schema afterwards, not here.
 */
function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;

  // If custom parser function is provided, use it
  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue);
  }

  // Determine parser type
  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);

  // Handle path parser specially - needs to resolve default values too
  if (parserType === 'path' && typeof defaultValue === 'string') {
    return resolveDataPath(envValue, defaultValue);
  }

  // Handle undefined/empty env value for other parsers
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);

    case 'number':
      return parseNumber(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);

    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);

    case 'optionalPath':
      return resolveDataPath(envValue, '');

    case 'duration':
      return parseDurationMs(envValue) ?? defaultValue;

    case 'timestamp':
      return parseTimestamp(envValue) ?? defaultValue;

    case 'stringArray':
      return parseStringArray(envValue, []);

    case 'string':
      if (option.allowedValues && typeof defaultValue === 'string') {
        return parseString(envValue, defaultValue, option.allowedValues);
      }
      return envValue;

    default:
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    const envValue = process.env[option.envKey];
    result[key] = parseEnvValue(option, envValue);
  }

  return result;
}

/**
 * Build complete config from registry metadata.
 * This is the single source of truth - no manual env var reading needed.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  // Build top-level options
  for (const [key, option] of Object.entries(registry.topLevel)) {
    const envValue = process.env[option.envKey];
    result[key] = parseEnvValue(option, envValue);
  }

  // Build sections
  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}
