/**
 * Pull a candidate SQL string out of free-form model output.
 */

const FENCE_PATTERNS: readonly RegExp[] = [
  /```sql\b\s*([\s\S]*?)\s*```/i,
  /```[\w-]*\s*(SELECT\b[\s\S]*?)\s*```/i,
  /```[\w-]*\s*(WITH\b[\s\S]*?)\s*```/i,
];

const SQL_LINE_START = /^(SELECT|WITH)\b/i;

/**
 * Returns null when the text holds no recognisable SQL, which callers
 * treat as a retryable outcome rather than an error.
 */
export function extractSql(modelText: string): string | null {
  for (const pattern of FENCE_PATTERNS) {
    const match = pattern.exec(modelText);
    const sql = match?.[1]?.trim();
    if (sql) return sql;
  }
  return extractFromLines(modelText);
}

/**
 * Capture from the first line that starts a query up to the first line
 * ending in `;`. The terminator is dropped: BigQuery does not need it.
 */
function extractFromLines(text: string): string | null {
  const captured: string[] = [];
  let inSql = false;

  for (const line of text.trim().split('\n')) {
    const trimmed = line.trim();
    if (!inSql && SQL_LINE_START.test(trimmed)) inSql = true;
    if (!inSql) continue;

    captured.push(line);
    if (trimmed.endsWith(';')) break;
  }

  if (captured.length === 0) return null;

  const sql = captured.join('\n').trim().replace(/;$/, '').trim();
  return sql || null;
}
