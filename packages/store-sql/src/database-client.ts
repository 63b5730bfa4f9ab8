/**
 * Database client abstraction
 *
 * Minimal interface for SQL database access. Works with any SQL database
 * (SQLite, PostgreSQL, etc.) through adapter implementations.
 */

/**
 * Result of an execute operation (INSERT, UPDATE, DELETE)
 */
export interface ExecuteResult {
  /** Last inserted row ID (for auto-increment columns) */
  lastInsertRowId: number;
  /** Number of rows affected by the statement */
  changes: number;
}

/**
 * Minimal database client interface
 *
 * Implementations wrap specific database drivers (sql.js, better-sqlite3, etc.)
 * to provide a consistent async interface for SQL operations.
 */
export interface DatabaseClient {
  /**
   * Execute a SQL query that returns rows
   *
   * @param sql SQL query string with ? placeholders
   * @param params Parameter values (positional)
   * @returns Array of row objects with column names as keys
   */
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;

  /**
   * Execute a SQL statement that doesn't return rows
   *
   * Use for INSERT, UPDATE, DELETE, and DDL statements.
   */
  execute(sql: string, params?: unknown[]): Promise<ExecuteResult>;

  /**
   * Execute multiple statements within a transaction
   *
   * Commits on success, rolls back on error. Use the provided client for
   * every operation inside `fn`.
   */
  transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T>;

  /**
   * Close the database connection. The client must not be used afterwards.
   */
  close(): Promise<void>;
}
