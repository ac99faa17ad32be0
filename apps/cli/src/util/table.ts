/**
 * Result formatting for CLI output: ASCII tables and CSV.
 */

const MAX_CELL_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => col.length);
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_CELL_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    const line = columns
      .map((col, i) => {
        const val = formatValue(row[col]);
        return val.length > widths[i] ? val.slice(0, widths[i] - 1) + '…' : val.padEnd(widths[i]);
      })
      .join(' | ');
    lines.push(line);
  }

  return lines.join('\n');
}

export function formatCsv(columns: string[], rows: Record<string, unknown>[]): string {
  const lines = [columns.map(escapeCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((col) => escapeCsvField(formatCsvValue(row[col]))).join(','));
  }
  return lines.join('\n');
}

export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * BigQuery wraps DATE, TIMESTAMP, NUMERIC and similar values in objects
 * with a string `value`; show that instead of the wrapper.
 */
export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (Buffer.isBuffer(val)) return val.toString('base64');
  if (typeof val === 'object') {
    if ('value' in val && typeof val.value === 'string') return val.value;
    return JSON.stringify(val);
  }
  return String(val);
}

function formatCsvValue(val: unknown): string {
  return val === null || val === undefined ? '' : formatValue(val);
}
