import path from 'path';
import { Command, CommanderError, Option } from 'commander';
import ora, { Ora } from 'ora';
import { z } from 'zod';
import { CliOverrides, ResolvedConfig, loadStaticConfig, resolveConfig } from '../config';
import { PgTableWriter, TableWriter, createPool, poolSource } from '../db';
import { ConfigurationError, LoadAbortedError, LoaderError, describeError } from '../errors';
import { selectFiles } from '../files';
import { LoadResult, TableLoader } from '../loader';
import { logger } from '../telemetry';

const cliOptionsSchema = z.object({
  db: z.string().optional(),
  dir: z.string().optional(),
  // `--csv` with no names selects nothing.
  csv: z
    .union([z.literal(true), z.array(z.string())])
    .optional()
    .transform((value) => (value === true ? [] : value)),
  schema: z.string().optional(),
  sep: z.string().optional(),
  encoding: z.string().optional(),
  chunksize: z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform(Number)
    .optional(),
  onDuplicateColumn: z.enum(['suffix', 'fail']).optional(),
  config: z.string().optional(),
});

export type CliDependencies = {
  createWriter: (config: ResolvedConfig) => TableWriter;
  env: NodeJS.ProcessEnv;
  cwd: string;
  silent: boolean;
};

const defaultDependencies: CliDependencies = {
  createWriter: (config) => new PgTableWriter(poolSource(createPool(config.databaseUrl))),
  env: process.env,
  cwd: process.cwd(),
  silent: false,
};

export const buildProgram = () =>
  new Command()
    .name('tabload')
    .description('Load CSV/XLSX files into PostgreSQL, one new table per file (stops if a table exists)')
    .option('--db <url>', 'PostgreSQL connection URL')
    .option('--dir <path>', 'directory holding the files')
    .option('--csv [names...]', 'specific files to load (none given: load nothing)')
    .option('--schema <name>', 'target schema')
    .option('--sep <char>', 'CSV separator')
    .option('--encoding <name>', 'CSV text encoding')
    .option('--chunksize <int>', 'rows per INSERT batch')
    .addOption(
      new Option('--on-duplicate-column <policy>', 'what to do when two headers sanitize to the same name').choices([
        'suffix',
        'fail',
      ]),
    )
    .option('--config <path>', 'static JSON configuration file')
    .exitOverride()
    .allowExcessArguments(false);

const parseCli = (argv: string[]) => {
  const program = buildProgram();
  program.parse(argv);
  const parsed = cliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid option --${issue?.path.join('.')}: ${issue?.message}`);
  }
  const { config, ...overrides } = parsed.data;
  return { configPath: config, overrides: overrides satisfies CliOverrides };
};

const trackProgress = (loader: TableLoader, silent: boolean) => {
  let spinner: Ora | undefined;
  loader.on('file:start', ({ file, table }) => {
    spinner = ora({ text: `${path.basename(file)} -> ${table}`, isSilent: silent }).start();
  });
  loader.on('file:loaded', (result: LoadResult) => {
    spinner?.succeed(`${result.table} created (${result.rows} rows)`);
  });
  loader.on('file:failed', ({ table, error }) => {
    spinner?.fail(`${table}: ${describeError(error)}`);
  });
};

export const runLoad = async (config: ResolvedConfig, deps: CliDependencies): Promise<LoadResult[]> => {
  const files = await selectFiles(config.directory, config.files);
  logger.info({ directory: config.directory, files: files.length }, 'Selected files');
  if (!files.length) return [];
  const writer = deps.createWriter(config);
  try {
    const loader = new TableLoader(writer);
    trackProgress(loader, deps.silent);
    return await loader.run(files, config);
  } finally {
    await writer.close();
  }
};

const report = (err: unknown) => {
  if (err instanceof LoadAbortedError) {
    console.error(`ERROR: ${err.table} (${err.file}): ${describeError(err.cause)}`);
    console.error(`Run stopped after ${err.completed.length} table(s).`);
  } else if (err instanceof LoaderError) {
    console.error(`ERROR: ${err.message}`);
  } else {
    console.error(`ERROR: ${describeError(err)}`);
  }
};

/** Runs the CLI and returns the process exit code. */
export const main = async (argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> => {
  const deps = { ...defaultDependencies, ...overrides };
  try {
    const { configPath, overrides: cli } = parseCli(argv);
    const config = resolveConfig(loadStaticConfig(configPath, deps.env, deps.cwd), cli);
    const results = await runLoad(
      { ...config, directory: path.resolve(deps.cwd, config.directory) },
      deps,
    );
    console.log(`Done: ${results.length} table(s) loaded.`);
    return 0;
  } catch (err) {
    // commander has already printed its own usage message
    if (err instanceof CommanderError) return err.exitCode;
    report(err);
    return 1;
  }
};
