import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../errors';

export const DEFAULT_CONFIG_FILE = 'tabload.config.json';

export const staticConfigSchema = z
  .object({
    DB_URL: z.string().nullable(),
    CSV_DIR: z.string().nullable(),
    CSV_NAMES: z.array(z.string()).nullable(),
    SCHEMA: z.string().nullable(),
    CSV_SEPARATOR: z.string().nullable(),
    CSV_ENCODING: z.string().nullable(),
    CHUNKSIZE: z.number().int().positive().nullable(),
    DUPLICATE_COLUMNS: z.enum(['suffix', 'fail']).nullable(),
  })
  .partial()
  .strict();

export type StaticConfig = z.infer<typeof staticConfigSchema>;

const parseConfigFile = (file: string): StaticConfig => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Could not read config file ${file}: ${describeError(err)}`);
  }
  const parsed = staticConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${file}`, parsed.error.issues);
  }
  return parsed.data;
};

/**
 * Loads the static configuration. A file named explicitly (argument or
 * TABLOAD_CONFIG) must exist; the default file is optional.
 */
export const loadStaticConfig = (
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): StaticConfig => {
  const named = explicitPath ?? env.TABLOAD_CONFIG;
  if (named) {
    return parseConfigFile(path.resolve(cwd, named));
  }
  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  return fs.existsSync(fallback) ? parseConfigFile(fallback) : {};
};
