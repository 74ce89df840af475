import type { TableReference } from './types/ai.types.js';

/**
 * Keyword anchors, each followed by whitespace and a bare identifier made of
 * word characters, dots, backticks or double quotes. Anchors are independent:
 * there is no grammar, and a keyword embedded in a longer word still matches.
 */
const TABLE_PATTERNS: readonly RegExp[] = [
  /FROM\s+([\w.`"]+)/gi,
  /JOIN\s+([\w.`"]+)/gi,
  /INTO\s+([\w.`"]+)/gi,
  /UPDATE\s+([\w.`"]+)/gi,
  /MERGE\s+INTO\s+([\w.`"]+)/gi,
  /TABLE\s+([\w.`"]+)/gi
];

// Clause keywords an anchor can capture instead of a table name
const REJECTED_KEYWORDS: ReadonlySet<string> = new Set(['AS', 'ON', 'WHERE', 'GROUP', 'ORDER', 'HAVING', 'SELECT']);

function stripQuoting(token: string): string {
  return token
    .trim()
    .replace(/^`+|`+$/g, '')
    .replace(/^"+|"+$/g, '')
    .trim();
}

function cleanMatch(raw: string): TableReference | null {
  let table = stripQuoting(raw);
  if (!table || REJECTED_KEYWORDS.has(table.toUpperCase())) {
    return null;
  }

  // Drop an alias glued on without AS
  const space = table.indexOf(' ');
  if (space !== -1) {
    table = table.slice(0, space);
  }

  if (!table || table.startsWith('(')) {
    return null;
  }
  return table;
}

/**
 * Extract the tables a SQL text appears to reference.
 *
 * Heuristic, not a parser: CTE names, table functions and quoted names with
 * spaces are over- or under-matched. Never throws; the result is deduplicated
 * (case-sensitive) and sorted.
 */
export function extractTableReferences(sqlText: string): TableReference[] {
  if (typeof sqlText !== 'string' || !sqlText) {
    return [];
  }

  const tables = new Set<TableReference>();
  for (const pattern of TABLE_PATTERNS) {
    for (const match of sqlText.matchAll(pattern)) {
      const table = cleanMatch(match[1] ?? '');
      if (table) {
        tables.add(table);
      }
    }
  }

  return Array.from(tables).sort();
}
