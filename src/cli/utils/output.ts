/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export type OutputFormat = 'json' | 'table';

// Keys whose array value is rendered as the table body
const LIST_KEYS = ['variables', 'records', 'entries', 'results'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  // Table format
  return formatAsTable(result);
}

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (!isRecord(result)) {
    return String(result);
  }

  for (const key of LIST_KEYS) {
    const list = result[key];
    if (Array.isArray(list)) {
      const header = 'count' in result ? `Count: ${String(result.count)}\n\n` : '';
      return header + formatArrayAsTable(list);
    }
  }

  // Single object - format as key-value pairs
  return formatObjectAsKeyValue(result);
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  const first = rows[0];
  if (!first || rows.length !== items.length) {
    return items.map((item) => formatValue(item)).join('\n');
  }

  // Columns from the first row, max 8
  const keys = Object.keys(first).slice(0, 8);
  const widths = keys.map((key) =>
    Math.max(key.length, Math.min(Math.max(...rows.map((row) => formatValue(row[key]).length)), 40))
  );

  const header = keys.map((k, i) => k.padEnd(widths[i] ?? k.length)).join(' | ');
  const separator = keys.map((k, i) => '-'.repeat(widths[i] ?? k.length)).join('-+-');
  const body = rows.map((row) =>
    keys
      .map((k, i) => {
        const width = widths[i] ?? k.length;
        return formatValue(row[k]).slice(0, width).padEnd(width);
      })
      .join(' | ')
  );

  return [header, separator, ...body].join('\n');
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > 40 ? str.slice(0, 37) + '...' : str;
  }
  return String(value);
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue; // Skip undefined values
    const formatted =
      typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
    lines.push(`${key}: ${formatted}`);
  }
  return lines.join('\n');
}
