import type { LoadResult } from './loader/types';

export type LoaderErrorCode =
  | 'configuration'
  | 'directory_not_found'
  | 'file_not_found'
  | 'unsupported_format'
  | 'read_failed'
  | 'duplicate_column'
  | 'table_exists'
  | 'database'
  | 'load_aborted';

export class LoaderError extends Error {
  readonly code: LoaderErrorCode;
  readonly details?: unknown;

  constructor(code: LoaderErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationError extends LoaderError {
  constructor(message: string, details?: unknown) {
    super('configuration', message, details);
  }
}

export class DirectoryNotFoundError extends LoaderError {
  readonly directory: string;

  constructor(directory: string) {
    super('directory_not_found', `Not a directory: ${directory}`);
    this.directory = directory;
  }
}

export class FileNotFoundError extends LoaderError {
  readonly path: string;

  constructor(path: string, message = `File not found: ${path}`) {
    super('file_not_found', message);
    this.path = path;
  }
}

export class UnsupportedFormatError extends LoaderError {
  readonly extension: string;

  constructor(file: string, extension: string) {
    super('unsupported_format', `Unsupported extension "${extension || '(none)'}": ${file}`);
    this.extension = extension;
  }
}

export class ReadError extends LoaderError {
  constructor(file: string, cause: unknown) {
    super('read_failed', `Could not read ${file}: ${describeError(cause)}`, undefined, { cause });
  }
}

export class DuplicateColumnError extends LoaderError {
  readonly column: string;

  constructor(column: string, headers: string[]) {
    super('duplicate_column', `Headers ${headers.map((h) => JSON.stringify(h)).join(', ')} all map to column "${column}"`, {
      headers,
    });
    this.column = column;
  }
}

export class TableAlreadyExistsError extends LoaderError {
  readonly table: string;

  constructor(table: string) {
    super('table_exists', `Table ${table} already exists`);
    this.table = table;
  }
}

export class DatabaseError extends LoaderError {
  readonly table: string;

  constructor(table: string, cause: unknown) {
    super('database', `Database error on ${table}: ${describeError(cause)}`, undefined, { cause });
    this.table = table;
  }
}

export class LoadAbortedError extends LoaderError {
  readonly file: string;
  readonly table: string;
  readonly completed: LoadResult[];

  constructor(file: string, table: string, completed: LoadResult[], cause: unknown) {
    super('load_aborted', `Load of ${table} from ${file} failed: ${describeError(cause)}`, undefined, { cause });
    this.file = file;
    this.table = table;
    this.completed = completed;
  }
}

/** `code` property of a Node or pg error, if any. */
export const errorCode = (err: unknown): string | undefined =>
  typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : undefined;

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
