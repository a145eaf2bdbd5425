import { existsSync, readFileSync, writeFileSync } from "node:fs";
import initSqlJs, { type Database, type ParamsObject, type SqlJsStatic, type SqlValue } from "sql.js";

export type StateRow = ParamsObject;

export const MEMORY_PATH = ":memory:";

let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

export interface StateStatement {
  run(...params: SqlValue[]): void;
  get(...params: SqlValue[]): StateRow | undefined;
  all(...params: SqlValue[]): StateRow[];
}

/**
 * SQLite connection over sql.js. The database lives in memory; a file-backed
 * connection writes its image back to disk after every top-level write or
 * committed transaction.
 */
export class StateDatabase {
  private depth = 0;

  private constructor(
    private readonly sql: SqlJsStatic,
    private db: Database,
    readonly path: string | null,
    readonly isReadonly: boolean
  ) {}

  static async open(path: string, options: { readonly?: boolean } = {}): Promise<StateDatabase> {
    const sql = await loadEngine();
    const file = path === MEMORY_PATH ? null : path;

    if (file && options.readonly && !existsSync(file)) {
      throw new Error(`State database not found at ${file}`);
    }

    const db = file && existsSync(file) ? new sql.Database(readFileSync(file)) : new sql.Database();
    return new StateDatabase(sql, db, file, options.readonly ?? false);
  }

  exec(sql: string): void {
    this.assertWritable();
    this.db.exec(sql);
    this.persist();
  }

  prepare(sql: string): StateStatement {
    return {
      run: (...params) => {
        this.assertWritable();
        this.db.run(sql, params);
        this.persist();
      },
      get: (...params) => this.query(sql, params)[0],
      all: (...params) => this.query(sql, params),
    };
  }

  transaction<A extends unknown[], T>(work: (...args: A) => T): (...args: A) => T {
    return (...args) => {
      if (this.depth > 0) return work(...args);

      this.assertWritable();
      this.db.exec("BEGIN");
      this.depth++;
      try {
        const result = work(...args);
        this.db.exec("COMMIT");
        return result;
      } catch (error) {
        this.db.exec("ROLLBACK");
        throw error;
      } finally {
        this.depth--;
        this.persist();
      }
    };
  }

  /** Reloads a read-only connection from its file to pick up writes from another process. */
  refresh(): void {
    if (!this.isReadonly || !this.path) return;

    const next = new this.sql.Database(readFileSync(this.path));
    this.db.close();
    this.db = next;
  }

  close(): void {
    this.db.close();
  }

  private query(sql: string, params: SqlValue[]): StateRow[] {
    const statement = this.db.prepare(sql);
    try {
      statement.bind(params);
      const rows: StateRow[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private assertWritable(): void {
    if (this.isReadonly) {
      throw new Error(`State database ${this.path ?? MEMORY_PATH} is read-only`);
    }
  }

  private persist(): void {
    if (this.path && this.depth === 0) {
      writeFileSync(this.path, this.db.export());
    }
  }
}
