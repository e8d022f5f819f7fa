import { Pool, escapeIdentifier } from 'pg';
import { DatabaseError, TableAlreadyExistsError, describeError, errorCode } from '../errors';
import type { Cell } from '../readers/types';
import { logger } from '../telemetry';
import {
  ConnectionSource,
  InsertOptions,
  SqlConnection,
  TableSpec,
  TableWriter,
  qualifiedName,
} from './types';

export * from './types';

// PostgreSQL rejects statements with more bind parameters than this.
export const MAX_BIND_PARAMS = 65535;

const DUPLICATE_TABLE = '42P07';

/** Accepts SQLAlchemy-style URLs such as `postgresql+psycopg2://...`. */
export const normalizeDatabaseUrl = (url: string) => url.replace(/^(postgres(?:ql)?)\+[a-z0-9_]+:\/\//i, '$1://');

export const createPool = (databaseUrl: string) => {
  logger.info('Connecting to PostgreSQL...');
  return new Pool({
    connectionString: normalizeDatabaseUrl(databaseUrl),
    max: 1,
    idleTimeoutMillis: 30000,
  });
};

export const poolSource = (pool: Pool): ConnectionSource => ({
  connect: async () => {
    const client = await pool.connect();
    return {
      query: (text: string, params?: unknown[]) => client.query(text, params),
      release: (err?: Error) => client.release(err),
    };
  },
  end: () => pool.end(),
});

export const rowsPerStatement = (batchSize: number, columnCount: number) =>
  Math.max(1, Math.min(batchSize, Math.floor(MAX_BIND_PARAMS / Math.max(columnCount, 1))));

export class PgTableWriter implements TableWriter {
  constructor(private source: ConnectionSource) {}

  async createAndInsert(spec: TableSpec, rows: Cell[][], options: InsertOptions): Promise<number> {
    const name = qualifiedName(spec);
    const target = `${escapeIdentifier(spec.schema)}.${escapeIdentifier(spec.table)}`;
    const client = await this.source.connect();
    // Set when the connection can no longer be trusted and must not go back to the pool.
    let broken: Error | undefined;
    try {
      const existing = await client.query(`SELECT to_regclass($1) AS oid`, [target]);
      if (existing.rows[0]?.oid != null) {
        throw new TableAlreadyExistsError(name);
      }
      await client.query('BEGIN');
      try {
        const columns = spec.columns.map((column) => `${escapeIdentifier(column)} TEXT`).join(', ');
        await client.query(`CREATE TABLE ${target} (${columns})`);
        const inserted = spec.columns.length ? await this.insertBatches(client, target, spec.columns, rows, options) : 0;
        await client.query('COMMIT');
        logger.info({ table: name, rows: inserted }, 'Table created');
        return inserted;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          logger.warn({ err: rollbackErr, table: name }, 'Rollback failed, discarding connection');
          broken = rollbackErr instanceof Error ? rollbackErr : new Error(describeError(rollbackErr));
        }
        throw err;
      }
    } catch (err) {
      if (err instanceof TableAlreadyExistsError) throw err;
      if (errorCode(err) === DUPLICATE_TABLE) throw new TableAlreadyExistsError(name);
      throw new DatabaseError(name, err);
    } finally {
      client.release(broken);
    }
  }

  private async insertBatches(
    client: SqlConnection,
    target: string,
    columns: string[],
    rows: Cell[][],
    options: InsertOptions,
  ) {
    const size = rowsPerStatement(options.batchSize, columns.length);
    const columnList = columns.map(escapeIdentifier).join(', ');
    let inserted = 0;
    for (let start = 0; start < rows.length; start += size) {
      const batch = rows.slice(start, start + size);
      const values = batch
        .map(
          (_, rowIndex) =>
            `(${columns.map((_, colIndex) => `$${rowIndex * columns.length + colIndex + 1}`).join(', ')})`,
        )
        .join(', ');
      const params = batch.flatMap((row) => columns.map((_, colIndex) => row[colIndex] ?? null));
      await client.query(`INSERT INTO ${target} (${columnList}) VALUES ${values}`, params);
      inserted += batch.length;
      logger.debug({ target, inserted, total: rows.length }, 'Inserted batch');
    }
    return inserted;
  }

  async close() {
    await this.source.end();
  }
}
