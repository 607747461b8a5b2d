/**
 * Rewrite Postgres-style placeholders ($1, $2, ...) to SQLite positional
 * placeholders (?).
 *
 * Only executable SQL is rewritten. Placeholders inside string literals,
 * quoted identifiers and comments are kept as written.
 */

export type SqlitePlaceholderRewriteResult = { sql: string; values: unknown[] };

export interface SqlitePlaceholderTemplate {
  sql: string;
  /** Zero-based index into the caller's params for each `?`, in order */
  parameterIndexes: number[];
}

/** Opening quote → closing quote. A doubled closer is an escape. */
const QUOTES: Readonly<Record<string, string>> = {
  "'": "'",
  '"': '"',
  '`': '`',
  '[': ']',
};

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';

/** Index just past the quoted run that opens at `start`. */
function skipQuoted(text: string, start: number, closer: string): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === closer) {
      if (text[i + 1] === closer) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return i;
}

/** Index just past the comment that opens at `start`, or start if none. */
function skipComment(text: string, start: number): number {
  const pair = text.slice(start, start + 2);
  if (pair === '--') {
    const end = text.indexOf('\n', start + 2);
    return end === -1 ? text.length : end + 1;
  }
  if (pair === '/*') {
    const end = text.indexOf('*/', start + 2);
    return end === -1 ? text.length : end + 2;
  }
  return start;
}

export function parseSqlitePlaceholderTemplate(text: string): SqlitePlaceholderTemplate {
  const parameterIndexes: number[] = [];
  let sql = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    const closer = QUOTES[ch];
    if (closer !== undefined) {
      const end = skipQuoted(text, i, closer);
      sql += text.slice(i, end);
      i = end;
      continue;
    }

    const commentEnd = skipComment(text, i);
    if (commentEnd !== i) {
      sql += text.slice(i, commentEnd);
      i = commentEnd;
      continue;
    }

    if (ch === '$' && isDigit(text[i + 1])) {
      let j = i + 1;
      while (isDigit(text[j])) j++;
      parameterIndexes.push(Number(text.slice(i + 1, j)) - 1);
      sql += '?';
      i = j;
      continue;
    }

    sql += ch;
    i++;
  }

  return { sql, parameterIndexes };
}

export function bindSqlitePlaceholderTemplate(
  template: SqlitePlaceholderTemplate,
  params: unknown[]
): SqlitePlaceholderRewriteResult {
  const values = template.parameterIndexes.map((idx) => {
    if (idx < 0 || idx >= params.length) {
      throw new RangeError(
        `[sqlite] Placeholder $${idx + 1} has no value (${params.length} param(s) supplied)`
      );
    }
    return params[idx];
  });
  return { sql: template.sql, values };
}

export interface SqlitePlaceholderCompiler {
  compile(text: string): SqlitePlaceholderTemplate;
  rewrite(text: string, params?: unknown[]): SqlitePlaceholderRewriteResult;
}

export function createSqlitePlaceholderCompiler(): SqlitePlaceholderCompiler {
  const cache = new Map<string, SqlitePlaceholderTemplate>();

  const compile = (text: string): SqlitePlaceholderTemplate => {
    const cached = cache.get(text);
    if (cached) return cached;

    const template = parseSqlitePlaceholderTemplate(text);
    cache.set(text, template);
    return template;
  };

  const rewrite = (text: string, params?: unknown[]): SqlitePlaceholderRewriteResult => {
    if (!text.includes('$')) {
      return { sql: text, values: params ?? [] };
    }
    return bindSqlitePlaceholderTemplate(compile(text), params ?? []);
  };

  return { compile, rewrite };
}
