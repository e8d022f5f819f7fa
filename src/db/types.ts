import type { QueryResultRow } from 'pg';
import type { Cell } from '../readers/types';

export type TableSpec = {
  schema: string;
  table: string;
  columns: string[];
};

export type InsertOptions = {
  batchSize: number;
};

/** Creates a table and fills it; must fail instead of touching an existing table. */
export interface TableWriter {
  createAndInsert(spec: TableSpec, rows: Cell[][], options: InsertOptions): Promise<number>;
  close(): Promise<void>;
}

export interface SqlConnection {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
  /** Passing an error discards the connection instead of returning it to the pool. */
  release(err?: Error): void;
}

export interface ConnectionSource {
  connect(): Promise<SqlConnection>;
  end(): Promise<void>;
}

export const qualifiedName = (spec: Pick<TableSpec, 'schema' | 'table'>) => `${spec.schema}.${spec.table}`;
