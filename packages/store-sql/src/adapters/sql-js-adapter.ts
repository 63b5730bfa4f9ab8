/**
 * sql.js adapter for DatabaseClient interface
 *
 * SQLite compiled to WebAssembly; runs in Node.js without native builds.
 */

import type { Database, SqlJsStatic } from "sql.js";
import type { DatabaseClient, ExecuteResult } from "../database-client.js";

export interface SqlJsAdapterOptions {
  /** Location of the sql.js WASM file (optional, uses the packaged one if not specified) */
  wasmUrl?: string;
  /** Pre-loaded sql.js module (optional, loads dynamically if not provided) */
  sqlJs?: SqlJsStatic;
}

/**
 * sql.js implementation of DatabaseClient
 *
 * Wraps the synchronous sql.js Database with an async interface.
 */
export class SqlJsAdapter implements DatabaseClient {
  private inTransaction = false;

  private constructor(private db: Database) {}

  /**
   * Create a new in-memory database
   */
  static async create(options?: SqlJsAdapterOptions): Promise<SqlJsAdapter> {
    const SQL = await SqlJsAdapter.loadSqlJs(options);
    return new SqlJsAdapter(new SQL.Database());
  }

  /**
   * Open a database from an exported SQLite file
   */
  static async open(data: Uint8Array, options?: SqlJsAdapterOptions): Promise<SqlJsAdapter> {
    const SQL = await SqlJsAdapter.loadSqlJs(options);
    return new SqlJsAdapter(new SQL.Database(data));
  }

  private static async loadSqlJs(options?: SqlJsAdapterOptions): Promise<SqlJsStatic> {
    if (options?.sqlJs) {
      return options.sqlJs;
    }

    const initSqlJs = (await import("sql.js")).default;
    const config: { locateFile?: (file: string) => string } = {};

    if (options?.wasmUrl) {
      const wasmUrl = options.wasmUrl;
      config.locateFile = () => wasmUrl;
    }

    return initSqlJs(config);
  }

  async query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]> {
    const stmt = this.db.prepare(sql);
    try {
      if (params && params.length > 0) {
        stmt.bind(this.convertParams(params));
      }
      const results: T[] = [];
      while (stmt.step()) {
        results.push(stmt.getAsObject() as T);
      }
      return results;
    } finally {
      stmt.free();
    }
  }

  async execute(sql: string, params?: unknown[]): Promise<ExecuteResult> {
    if (params && params.length > 0) {
      this.db.run(sql, this.convertParams(params));
    } else {
      this.db.run(sql);
    }

    return {
      lastInsertRowId: this.selectNumber("SELECT last_insert_rowid() AS value"),
      changes: this.selectNumber("SELECT changes() AS value"),
    };
  }

  async transaction<T>(fn: (client: DatabaseClient) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      // Already in a transaction, just run the function
      return fn(this);
    }

    this.inTransaction = true;
    try {
      this.db.run("BEGIN TRANSACTION");
      const result = await fn(this);
      this.db.run("COMMIT");
      return result;
    } catch (error) {
      this.db.run("ROLLBACK");
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  /**
   * Export the database as an SQLite file image
   */
  export(): Uint8Array {
    return this.db.export();
  }

  private convertParams(params: unknown[]): (number | string | Uint8Array | null)[] {
    return params.map((p) => {
      if (p === null || p === undefined) {
        return null;
      }
      if (typeof p === "boolean") {
        return p ? 1 : 0;
      }
      if (p instanceof Uint8Array || typeof p === "number" || typeof p === "string") {
        return p;
      }
      return String(p);
    });
  }

  private selectNumber(sql: string): number {
    const stmt = this.db.prepare(sql);
    try {
      if (!stmt.step()) return 0;
      const [value] = stmt.get();
      return typeof value === "number" ? value : 0;
    } finally {
      stmt.free();
    }
  }
}
