import type { DuplicateColumnPolicy } from '../sanitize';

export type LoadOptions = {
  schema: string;
  delimiter: string;
  encoding: string;
  batchSize: number;
  duplicateColumns: DuplicateColumnPolicy;
};

export type LoadResult = {
  file: string;
  /** Qualified `schema.table`. */
  table: string;
  rows: number;
};

export type LoaderEvents = {
  'file:start': (event: { file: string; table: string }) => void;
  'file:loaded': (result: LoadResult) => void;
  'file:failed': (event: { file: string; table: string; error: unknown }) => void;
};
