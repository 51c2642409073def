/**
 * CLI Stdin Utilities
 *
 * Reads piped input for commands that accept a document on stdin.
 */

import { createInvalidParameterError } from '../../core/errors.js';

/**
 * Read all of stdin, or undefined when nothing is piped in
 */
export async function readStdin(): Promise<string | undefined> {
  // Skip if running in TTY with no piped input
  if (process.stdin.isTTY) return undefined;

  let data = '';
  for await (const chunk of process.stdin) {
    data += Buffer.isBuffer(chunk) ? chunk.toString('utf8') : String(chunk);
  }
  return data.trim() || undefined;
}

/**
 * Parse JSON text, reporting the offending input on failure
 */
export function parseJsonInput(source: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const preview = text.length > 100 ? `${text.slice(0, 100)}...` : text;
    throw createInvalidParameterError(source, `invalid JSON: ${preview}`);
  }
}
