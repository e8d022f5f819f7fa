import { parse } from 'csv-parse/sync';
import { decodeText } from './encoding';
import { Cell, CsvOptions, TabularData } from './types';

export const parseCsv = (bytes: Buffer, options: CsvOptions): TabularData => {
  const records: string[][] = parse(decodeText(bytes, options.encoding), {
    delimiter: options.delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count_less: true,
  });
  const [headers = [], ...body] = records;
  // Short records are padded with NULL; every present cell stays text.
  const rows = body.map((record): Cell[] =>
    record.length < headers.length ? [...record, ...Array<Cell>(headers.length - record.length).fill(null)] : record,
  );
  return { headers, rows };
};
