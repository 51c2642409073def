/**
 * Fingerprint Extractor
 *
 * Turns the configured, ordered field list of a document into a fixed-length
 * key. Each field becomes a type-tagged token so that values of different
 * types never share a canonical form ("1" vs 1, null vs absent), and each
 * token is length-prefixed so that no value can spill into its neighbour
 * ("ab" + "c" vs "a" + "bc").
 *
 *   s<string>   n<number>   b<true|false>   z (null)
 *   j<canonical JSON>       ! (field absent)
 */

import type { FieldValue, FingerprintKey, StoredDocument } from '../../core/types.js';
import { createConfigurationError } from '../../core/errors.js';
import type { Hasher } from './hashers.js';

const ABSENT_TOKEN = '!';

export interface FingerprintExtractor {
  readonly fields: readonly string[];
  fingerprint(document: Pick<StoredDocument, 'fields'>): FingerprintKey;
  /** The string that gets hashed, exposed for diagnostics */
  canonicalForm(document: Pick<StoredDocument, 'fields'>): string;
}

/**
 * Shortest round-trip number form; -0 and 0 are the same value.
 */
function canonicalNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

/**
 * JSON with object keys sorted at every level and numbers in canonical form.
 */
export function canonicalJson(value: FieldValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return canonicalNumber(value);
  if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const keys = Object.keys(value).sort();
  const parts: string[] = [];
  for (const key of keys) {
    const entry = value[key];
    if (entry === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${canonicalJson(entry)}`);
  }
  return `{${parts.join(',')}}`;
}

/**
 * Read a field by name. A key that exists verbatim wins; otherwise a dotted
 * name walks nested objects ("source.host").
 */
export function readField(
  fields: Record<string, FieldValue>,
  path: string
): FieldValue | undefined {
  if (Object.hasOwn(fields, path)) return fields[path];
  if (!path.includes('.')) return undefined;

  let current: FieldValue | undefined = fields;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    if (!Object.hasOwn(current, segment)) return undefined;
    current = current[segment];
  }
  return current;
}

export function canonicalToken(value: FieldValue | undefined): string {
  if (value === undefined) return ABSENT_TOKEN;
  if (value === null) return 'z';
  switch (typeof value) {
    case 'string':
      return `s${value}`;
    case 'number':
      return `n${canonicalNumber(value)}`;
    case 'boolean':
      return `b${value}`;
    default:
      return `j${canonicalJson(value)}`;
  }
}

export function createFingerprintExtractor(
  fields: readonly string[],
  hasher: Hasher
): FingerprintExtractor {
  if (fields.length === 0) {
    throw createConfigurationError(
      'fields',
      'at least one fingerprint field is required',
      'set DEDUP_FIELDS or pass --fields'
    );
  }
  const fieldList = [...fields];

  function canonicalForm(document: Pick<StoredDocument, 'fields'>): string {
    let out = '';
    for (const field of fieldList) {
      const token = canonicalToken(readField(document.fields, field));
      out += `${token.length}:${token}`;
    }
    return out;
  }

  return {
    fields: fieldList,
    canonicalForm,
    fingerprint(document) {
      return hasher.hash(canonicalForm(document));
    },
  };
}
