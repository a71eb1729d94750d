import Database from 'better-sqlite3';
import fs from 'fs-extra';
import path from 'path';

export type Connection = Database.Database;

/**
 * Open the database file, run `fn`, close. Every catalog and job operation
 * uses its own short-lived connection; there is no pool.
 */
export function withConnection<T>(dbPath: string, fn: (db: Connection) => T): T {
  if (dbPath !== ':memory:') {
    fs.ensureDirSync(path.dirname(dbPath));
  }
  const db = new Database(dbPath);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/**
 * Parameterized WHERE fragment. `sql` only ever contains allow-listed
 * identifiers; user values travel in `params`.
 */
export interface WhereClause {
  sql: string;
  params: string[];
}

export const NO_FILTER: WhereClause = { sql: '', params: [] };

export function andClauses(clauses: WhereClause[]): WhereClause {
  const present = clauses.filter(clause => clause.sql.length > 0);
  if (present.length === 0) return NO_FILTER;
  return {
    sql: present.map(clause => (present.length > 1 ? `(${clause.sql})` : clause.sql)).join(' AND '),
    params: present.flatMap(clause => clause.params),
  };
}

export function whereSql(clause: WhereClause): string {
  return clause.sql ? ` WHERE ${clause.sql}` : '';
}

/**
 * Escape LIKE wildcards so a literal value matches literally under `ESCAPE '\'`.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}
