import { Code, DomainException } from '@deep-research/domain/exceptions';

const DENIED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'TRUNCATE',
  'CREATE',
  'GRANT',
  'REVOKE',
  'VACUUM',
  'ATTACH',
  'DETACH',
  'COPY',
  'INSTALL',
  'LOAD',
  'PRAGMA',
  'EXPORT',
  'IMPORT',
];

const DENIED_PATTERN = new RegExp(`\\b(${DENIED_KEYWORDS.join('|')})\\b`, 'i');

const rejected = (message: string, sql: string) =>
  DomainException.new({
    code: Code.READ_ONLY_QUERY_ERROR,
    overrideMessage: message,
    data: { sql },
  });

/**
 * Returns the statement with markdown fences and trailing semicolons removed.
 * Throws READ_ONLY_QUERY_ERROR unless it is a single SELECT / WITH statement
 * free of write or DDL keywords.
 */
export function assertReadOnlySql(sqlRaw: string): string {
  let sql = sqlRaw.trim();

  if (sql.startsWith('```')) {
    sql = sql
      .replace(/^```[a-zA-Z0-9_-]*\s*/, '')
      .replace(/\s*```$/, '')
      .trim();
  }
  sql = sql.replace(/;+\s*$/, '').trim();

  if (!/^(SELECT|WITH)\b/i.test(sql)) {
    throw rejected('Only SELECT / WITH queries are allowed.', sql);
  }
  // Quoted identifiers and literals may legitimately contain keywords.
  const bare = sql
    .replace(/'(?:[^']|'')*'/g, "''")
    .replace(/"(?:[^"]|"")*"/g, '""');
  if (bare.includes(';')) {
    throw rejected('Multiple statements are not allowed.', sql);
  }
  const denied = DENIED_PATTERN.exec(bare);
  if (denied) {
    throw rejected(
      `Write/DDL operations are not allowed (found ${denied[1]?.toUpperCase()}).`,
      sql,
    );
  }
  return sql;
}
