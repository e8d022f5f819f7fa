import path from 'path';
import { DirectoryNotFoundError, FileNotFoundError } from '@errors';
import { isSupportedFile, selectFiles } from '@files/index';
import { makeTempDir, removeTempDir } from '../utils/tmp';

describe('selectFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir({ 'b.csv': 'x\n1\n', 'a.csv': 'x\n1\n', 'c.txt': 'ignored' });
  });

  afterEach(() => removeTempDir(dir));

  it('scans the directory in sorted order when no list is given', async () => {
    await expect(selectFiles(dir, null)).resolves.toEqual([path.join(dir, 'a.csv'), path.join(dir, 'b.csv')]);
  });

  it('matches extensions case-insensitively', async () => {
    const other = makeTempDir({ 'Sales.XLSX': '', 'old.xls': '', 'notes.md': '' });
    try {
      await expect(selectFiles(other, null)).resolves.toEqual([path.join(other, 'Sales.XLSX'), path.join(other, 'old.xls')]);
    } finally {
      removeTempDir(other);
    }
  });

  it('treats an empty list as "process nothing"', async () => {
    await expect(selectFiles(dir, [])).resolves.toEqual([]);
  });

  it('keeps the explicit order and duplicates', async () => {
    await expect(selectFiles(dir, ['b.csv', 'a.csv', 'b.csv'])).resolves.toEqual([
      path.join(dir, 'b.csv'),
      path.join(dir, 'a.csv'),
      path.join(dir, 'b.csv'),
    ]);
  });

  it('accepts absolute paths and files of any extension when listed', async () => {
    const other = makeTempDir({ 'extra.csv': 'x\n' });
    try {
      const absolute = path.join(other, 'extra.csv');
      await expect(selectFiles(dir, [absolute, 'c.txt'])).resolves.toEqual([absolute, path.join(dir, 'c.txt')]);
    } finally {
      removeTempDir(other);
    }
  });

  it('fails on the first missing entry', async () => {
    const attempt = selectFiles(dir, ['missing.csv', 'also-missing.csv']);
    await expect(attempt).rejects.toBeInstanceOf(FileNotFoundError);
    await expect(attempt).rejects.toMatchObject({ path: path.join(dir, 'missing.csv') });
  });

  it('fails when the directory has no supported files', async () => {
    const empty = makeTempDir({ 'readme.txt': '' });
    try {
      await expect(selectFiles(empty, null)).rejects.toBeInstanceOf(FileNotFoundError);
    } finally {
      removeTempDir(empty);
    }
  });

  it('rejects a missing directory or a plain file', async () => {
    await expect(selectFiles(path.join(dir, 'nope'), null)).rejects.toBeInstanceOf(DirectoryNotFoundError);
    await expect(selectFiles(path.join(dir, 'a.csv'), [])).rejects.toBeInstanceOf(DirectoryNotFoundError);
  });
});

describe('isSupportedFile', () => {
  it('recognizes tabular extensions', () => {
    expect(isSupportedFile('a.CSV')).toBe(true);
    expect(isSupportedFile('a.xlsx')).toBe(true);
    expect(isSupportedFile('a.csv.bak')).toBe(false);
  });
});
