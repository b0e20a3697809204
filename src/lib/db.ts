import { Pool } from "pg";

export interface QueryResultLike {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface PoolClientLike extends Queryable {
  /** Passing an error (or true) discards the connection instead of reusing it. */
  release(err?: Error | boolean): void;
}

/** What the sink needs from a pg Pool; lets tests pass an in-process fake. */
export interface PoolLike extends Queryable {
  connect(): Promise<PoolClientLike>;
  end(): Promise<void>;
}

export function createPool(connectionString: string): Pool {
  return new Pool({ connectionString, max: 4 });
}
