/**
 * Text-level SQL helpers shared by the backends. No parsing beyond the
 * leading keyword: the database decides what the statement means.
 */

const ROW_KEYWORDS = new Set(['SELECT', 'WITH', 'VALUES', 'TABLE']);

/** Drop leading whitespace, comments and opening parens */
export function stripLeadingNoise(sql: string): string {
  let rest = sql;
  for (;;) {
    const trimmed = rest.replace(/^[\s(]+/, '');
    if (trimmed.startsWith('--')) {
      const newline = trimmed.indexOf('\n');
      rest = newline < 0 ? '' : trimmed.slice(newline + 1);
    } else if (trimmed.startsWith('/*')) {
      const end = trimmed.indexOf('*/');
      rest = end < 0 ? '' : trimmed.slice(end + 2);
    } else {
      return trimmed;
    }
  }
}

export function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/[;\s]+$/, '');
}

/** Upper-cased first keyword, e.g. "SELECT"; empty for blank input */
export function leadingKeyword(sql: string): string {
  const match = /^[A-Za-z]+/.exec(stripLeadingNoise(sql));
  return match ? match[0].toUpperCase() : '';
}

/**
 * True when the statement is a plain query that can sit behind a cursor.
 * Writes with RETURNING still run, just without a cursor.
 */
export function returnsRows(sql: string): boolean {
  return ROW_KEYWORDS.has(leadingKeyword(sql));
}

export function isBlankSql(sql: string): boolean {
  return stripTrailingSemicolons(stripLeadingNoise(sql)).length === 0;
}

/** Double-quoted identifier, the same rule in Postgres and SQLite */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
