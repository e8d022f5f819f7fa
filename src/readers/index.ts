import path from 'path';
import { promises as fs } from 'fs';
import { LoaderError, ReadError, UnsupportedFormatError } from '../errors';
import { logger } from '../telemetry';
import { parseCsv } from './csvParser';
import { parseXlsx } from './xlsxParser';
import { CsvOptions, TabularData } from './types';

export * from './types';

export type TabularFormat = 'csv' | 'xlsx';

export const detectFormat = (file: string): TabularFormat => {
  const ext = path.extname(file).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.xlsx' || ext === '.xls') return 'xlsx';
  throw new UnsupportedFormatError(file, ext);
};

/** Reads a whole file into memory; every cell comes back as text. */
export const readTabularFile = async (file: string, options: CsvOptions): Promise<TabularData> => {
  const format = detectFormat(file);
  try {
    const bytes = await fs.readFile(file);
    const data = format === 'csv' ? parseCsv(bytes, options) : parseXlsx(bytes);
    if (!data.headers.length) {
      throw new ReadError(file, 'no header row');
    }
    logger.debug({ file, format, columns: data.headers.length, rows: data.rows.length }, 'Read tabular file');
    return data;
  } catch (err) {
    if (err instanceof LoaderError) throw err;
    throw new ReadError(file, err);
  }
};
