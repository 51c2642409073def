/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { loggingSection } from './sections/logging.js';
import { scanSection } from './sections/scan.js';
import { storeSection } from './sections/store.js';
import { retrySection } from './sections/retry.js';
import { pathsSection } from './sections/paths.js';
import { runtimeSection } from './sections/runtime.js';

// =============================================================================
// COMPLETE REGISTRY
// =============================================================================

/**
 * The complete config registry with all sections.
 */
export const configRegistry = {
  topLevel: {},
  sections: {
    logging: loggingSection,
    scan: scanSection,
    store: storeSection,
    retry: retrySection,
    paths: pathsSection,
    runtime: runtimeSection,
  },
} satisfies ConfigRegistry;

export { loggingSection, scanSection, storeSection, retrySection, pathsSection, runtimeSection };

// Re-export types and utilities
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  buildConfigSchema,
  validateConfig,
  getAllEnvVars,
  buildConfigFromRegistry,
} from './schema-builder.js';
