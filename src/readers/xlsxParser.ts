import XLSX from 'xlsx';
import { TabularData } from './types';

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

// Date serials are rendered from their calendar parts, so no time zone applies.
const formatDateSerial = (serial: number) => {
  const date = XLSX.SSF.parse_date_code(serial);
  const day = `${pad(date.y, 4)}-${pad(date.m)}-${pad(date.d)}`;
  return date.H || date.M || date.S ? `${day} ${pad(date.H)}:${pad(date.M)}:${pad(date.S)}` : day;
};

/** Full-precision text of a cell; the formatted text is only used when there is no raw value. */
export const cellText = (cell: XLSX.CellObject | undefined): string => {
  if (!cell || cell.v === undefined || cell.v === null) return cell?.w ?? '';
  const value = cell.v;
  if (value instanceof Date) return value.toISOString();
  if (cell.t === 'n' && typeof value === 'number' && typeof cell.z === 'string' && XLSX.SSF.is_date(cell.z)) {
    return formatDateSerial(value);
  }
  if (cell.t === 'e') return cell.w ?? String(value);
  return String(value);
};

const usedWidth = (record: string[]) => {
  let width = record.length;
  while (width > 0 && record[width - 1] === '') width -= 1;
  return width;
};

export const parseXlsx = (bytes: Buffer): TabularData => {
  const workbook = XLSX.read(bytes, { type: 'buffer', cellNF: true });
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  const ref = sheet?.['!ref'];
  if (!sheet || !ref) return { headers: [], rows: [] };
  const range = XLSX.utils.decode_range(ref);
  const records: string[][] = [];
  for (let r = range.s.r; r <= range.e.r; r += 1) {
    const record: string[] = [];
    for (let c = range.s.c; c <= range.e.c; c += 1) {
      const cell: XLSX.CellObject | undefined = sheet[XLSX.utils.encode_cell({ r, c })];
      record.push(cellText(cell));
    }
    if (record.some((value) => value !== '')) records.push(record);
  }
  const width = records.reduce((max, record) => Math.max(max, usedWidth(record)), 0);
  const [headers = [], ...rows] = records.map((record) => record.slice(0, width));
  return { headers, rows };
};
