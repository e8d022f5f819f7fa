import EventEmitter from 'eventemitter3';
import { TableWriter, qualifiedName } from '../db/types';
import { LoadAbortedError } from '../errors';
import { readTabularFile } from '../readers';
import { sanitizeColumns, sanitizeTableName } from '../sanitize';
import { logger } from '../telemetry';
import { LoadOptions, LoadResult, LoaderEvents } from './types';

export * from './types';

export class TableLoader extends EventEmitter<LoaderEvents> {
  constructor(private writer: TableWriter) {
    super();
  }

  async loadFile(file: string, options: LoadOptions): Promise<LoadResult> {
    const table = sanitizeTableName(file);
    const data = await readTabularFile(file, { delimiter: options.delimiter, encoding: options.encoding });
    const spec = { schema: options.schema, table, columns: sanitizeColumns(data.headers, options.duplicateColumns) };
    const rows = await this.writer.createAndInsert(spec, data.rows, { batchSize: options.batchSize });
    return { file, table: qualifiedName(spec), rows };
  }

  /**
   * Loads files one after another. The first failure stops the run; files
   * after it are never read.
   */
  async run(files: readonly string[], options: LoadOptions): Promise<LoadResult[]> {
    const results: LoadResult[] = [];
    for (const file of files) {
      const table = qualifiedName({ schema: options.schema, table: sanitizeTableName(file) });
      this.emit('file:start', { file, table });
      try {
        const result = await this.loadFile(file, options);
        results.push(result);
        this.emit('file:loaded', result);
      } catch (error) {
        logger.error({ err: error, file, table }, 'Load failed, stopping run');
        this.emit('file:failed', { file, table, error });
        throw new LoadAbortedError(file, table, [...results], error);
      }
    }
    return results;
  }
}
