import dotenv from 'dotenv';
import { ConfigurationError } from '../errors';
import type { LoadOptions } from '../loader/types';
import type { DuplicateColumnPolicy } from '../sanitize';
import { resolveValue } from './resolve';
import type { StaticConfig } from './static';

dotenv.config();

export * from './resolve';
export * from './static';

export type CliOverrides = {
  db?: string;
  dir?: string;
  csv?: string[];
  schema?: string;
  sep?: string;
  encoding?: string;
  chunksize?: number;
  onDuplicateColumn?: DuplicateColumnPolicy;
};

export type ResolvedConfig = Readonly<
  LoadOptions & {
    databaseUrl: string;
    directory: string;
    /** `null` scans the directory; an empty list loads nothing. */
    files: readonly string[] | null;
  }
>;

export const DEFAULTS = {
  directory: '.',
  schema: 'public',
  delimiter: ',',
  encoding: 'utf-8',
  batchSize: 2000,
  duplicateColumns: 'suffix',
} as const satisfies Partial<Record<keyof ResolvedConfig, unknown>>;

export const resolveConfig = (staticConfig: StaticConfig, cli: CliOverrides): ResolvedConfig => {
  const databaseUrl = resolveValue(staticConfig.DB_URL, cli.db);
  if (!databaseUrl) {
    throw new ConfigurationError('DB_URL is not set in the config file nor passed with --db');
  }
  const delimiter = resolveValue(staticConfig.CSV_SEPARATOR, cli.sep, DEFAULTS.delimiter);
  if (!delimiter.length) {
    throw new ConfigurationError('Separator must not be empty');
  }
  const batchSize = resolveValue(staticConfig.CHUNKSIZE, cli.chunksize, DEFAULTS.batchSize);
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`);
  }
  const files = resolveValue(staticConfig.CSV_NAMES, cli.csv);
  return Object.freeze({
    databaseUrl,
    directory: resolveValue(staticConfig.CSV_DIR, cli.dir, DEFAULTS.directory),
    files: files === undefined ? null : Object.freeze([...files]),
    schema: resolveValue(staticConfig.SCHEMA, cli.schema, DEFAULTS.schema),
    delimiter,
    encoding: resolveValue(staticConfig.CSV_ENCODING, cli.encoding, DEFAULTS.encoding),
    batchSize,
    duplicateColumns: resolveValue<DuplicateColumnPolicy>(
      staticConfig.DUPLICATE_COLUMNS,
      cli.onDuplicateColumn,
      DEFAULTS.duplicateColumns,
    ),
  });
};
