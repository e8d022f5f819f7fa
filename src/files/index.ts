import path from 'path';
import { promises as fs } from 'fs';
import { DirectoryNotFoundError, FileNotFoundError, errorCode } from '../errors';
import { logger } from '../telemetry';

export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const isSupportedFile = (name: string) => {
  const lower = name.toLowerCase();
  return SUPPORTED_EXTENSIONS.some((ext) => lower.endsWith(ext));
};

const exists = async (target: string) => {
  try {
    await fs.stat(target);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return false;
    throw err;
  }
};

const isDirectory = async (target: string) => {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw err;
  }
};

/**
 * Resolves the files to load.
 *
 * `explicit === null` scans `dir` (non-recursive) for supported files and
 * sorts them; an empty list selects nothing; otherwise every entry must
 * exist, relative entries being resolved against `dir`.
 */
export const selectFiles = async (dir: string, explicit: readonly string[] | null): Promise<string[]> => {
  if (!(await isDirectory(dir))) {
    throw new DirectoryNotFoundError(dir);
  }

  if (explicit !== null) {
    const files: string[] = [];
    for (const name of explicit) {
      const candidate = path.isAbsolute(name) ? name : path.join(dir, name);
      if (!(await exists(candidate))) {
        throw new FileNotFoundError(candidate);
      }
      files.push(candidate);
    }
    logger.debug({ dir, count: files.length }, 'Using explicit file list');
    return files;
  }

  const entries = await fs.readdir(dir);
  const files = entries.filter(isSupportedFile).map((entry) => path.join(dir, entry));
  if (!files.length) {
    throw new FileNotFoundError(dir, `No ${SUPPORTED_EXTENSIONS.join('/')} files in: ${dir}`);
  }
  files.sort();
  logger.debug({ dir, count: files.length }, 'Scanned directory');
  return files;
};
