/**
 * Renders schema snapshots into the text embedded in prompts.
 */

import type { SchemaSnapshot, TableInfo } from '../db/types.js';

export interface SchemaContextOpts {
  /** Only these tables (by short name); default all */
  tables?: string[];
  /** Include `Row count:` lines. Default: true */
  includeRowCounts?: boolean;
}

function pickTables(snapshot: SchemaSnapshot, names?: string[]): TableInfo[] {
  if (!names || names.length === 0) return snapshot.tables;
  const wanted = new Set(names.map((n) => n.toLowerCase()));
  return snapshot.tables.filter((t) => wanted.has(t.name.toLowerCase()));
}

export function buildSchemaContext(snapshot: SchemaSnapshot, opts: SchemaContextOpts = {}): string {
  const includeRowCounts = opts.includeRowCounts ?? true;
  const lines: string[] = [`Project: ${snapshot.project}`, `Dataset: ${snapshot.dataset}`, ''];

  for (const table of pickTables(snapshot, opts.tables)) {
    lines.push(`### Table: \`${table.fullName}\``);
    if (table.description) {
      lines.push(`Description: ${table.description}`);
    }
    if (includeRowCounts && table.rowCount) {
      lines.push(`Row count: ${table.rowCount.toLocaleString('en-US')}`);
    }

    lines.push('', 'Columns:');
    for (const col of table.columns) {
      const mode = col.mode !== 'NULLABLE' ? `, ${col.mode}` : '';
      const description = col.description ? ` - ${col.description}` : '';
      lines.push(`  - \`${col.name}\` (${col.dataType}${mode})${description}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/** One line per table: name and column names only. */
export function buildMinimalContext(snapshot: SchemaSnapshot, tables?: string[]): string {
  return pickTables(snapshot, tables)
    .map((t) => `\`${t.fullName}\`: ${t.columns.map((c) => `\`${c.name}\``).join(', ')}`)
    .join('\n');
}

/**
 * Tables whose name (or its singular/plural form) appears in the
 * question. Falls back to every table when nothing matches.
 */
export function findRelevantTables(question: string, tableNames: string[]): string[] {
  const q = question.toLowerCase();
  const relevant = tableNames.filter((table) => {
    const name = table.toLowerCase();
    if (q.includes(name)) return true;
    if (name.endsWith('s') && q.includes(name.slice(0, -1))) return true;
    return q.includes(`${name}s`);
  });
  return relevant.length > 0 ? relevant : tableNames;
}
