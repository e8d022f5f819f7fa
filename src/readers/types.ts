export type Cell = string | null;

export type TabularData = {
  headers: string[];
  rows: Cell[][];
};

export type CsvOptions = {
  delimiter: string;
  encoding: string;
};
