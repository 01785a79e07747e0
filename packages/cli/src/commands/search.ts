import path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { SearchSession, type Query, type QueryMode, type SessionOutcome } from '@treescout/search';
import {
  AppError,
  ConsoleLogger,
  JsonlLogger,
  UsageError,
  type Logger,
  type SessionConfigInput,
} from '@treescout/shared';
import { ConfigLoader } from '../config/loader';
import { OutputRenderer, type StatusStream } from '../output/renderer';
import { listenForCancel, type KeyInput } from '../ui/keypress';
import type { GlobalOptions } from '../types';

export const QUERY_MODES: readonly QueryMode[] = ['fuzzy', 'glob', 'content', 'type'];

/** Options shared by `search` and `preset`. */
export interface FilterOptions {
  maxResults?: number;
  timeBudget?: number;
  hidden?: boolean;
  followSymlinks?: boolean;
  caseSensitive?: boolean;
  exclude?: string[];
  ext?: string[];
  maxDepth?: number;
  minSize?: string;
  maxSize?: string;
  includeDirs?: boolean;
  gitignore: boolean;
  stopOnCap?: boolean;
}

export interface SearchCommandOptions extends FilterOptions {
  mode: QueryMode;
  threshold?: number;
  literal?: boolean;
  wholeWord?: boolean;
}

export interface CommandIO {
  stdin: KeyInput;
  stderr: StatusStream;
}

function integer(flag: string, min: number, max = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
      throw new InvalidArgumentError(`${flag} must be an integer ${range}.`);
    }
    return parsed;
  };
}

/** Maps command flags onto session options; unset flags stay unset. */
export function toConfigFlags(options: FilterOptions & Partial<SearchCommandOptions>): SessionConfigInput {
  return {
    maxResults: options.maxResults,
    fuzzyThreshold: options.threshold,
    timeBudgetMs: options.timeBudget,
    searchHidden: options.hidden,
    followSymlinks: options.followSymlinks,
    regex: options.literal ? false : undefined,
    ignoreCase: options.caseSensitive ? false : undefined,
    wholeWord: options.wholeWord,
    extraExcludes: options.exclude,
    extensions: options.ext,
    maxDepth: options.maxDepth,
    minSize: options.minSize,
    maxSize: options.maxSize,
    includeDirectories: options.includeDirs,
    respectGitignore: options.gitignore ? undefined : false,
    stopOnCap: options.stopOnCap,
  };
}

function createLogger(globalOpts: GlobalOptions): Logger | undefined {
  if (globalOpts.logFile) {
    return new JsonlLogger(path.resolve(globalOpts.logFile));
  }
  if (globalOpts.verbose) {
    return new ConsoleLogger();
  }
  return undefined;
}

export function addFilterOptions(command: Command): Command {
  return command
    .option('-n, --max-results <n>', 'Maximum number of results kept', integer('--max-results', 1))
    .option('--time-budget <ms>', 'Stop searching after this many milliseconds', integer('--time-budget', 1))
    .option('-H, --hidden', 'Search hidden files and directories')
    .option('-L, --follow-symlinks', 'Follow symbolic links')
    .option('-s, --case-sensitive', 'Match case exactly')
    .option('-e, --exclude <pattern...>', 'Extra names or globs to skip')
    .option('-x, --ext <extension...>', 'Only consider files with these extensions (e.g. ts md .env)')
    .option('-d, --max-depth <n>', 'Deepest level to search', integer('--max-depth', 1))
    .option('--min-size <size>', 'Skip files smaller than this (e.g. 10K)')
    .option('--max-size <size>', 'Skip files larger than this (e.g. 5M)')
    .option('--include-dirs', 'Match directory names too')
    .option('--no-gitignore', 'Do not apply the root .gitignore')
    .option('--stop-on-cap', 'Finish as soon as --max-results matches are held');
}

export interface SearchRun {
  root: string | undefined;
  flags: SessionConfigInput;
  /** Required unless a preset supplies the query */
  query?: Query;
  preset?: string;
}

/** Loads config, runs one session with cancel keys wired up and renders the outcome. */
export async function runSearch(program: Command, io: CommandIO, run: SearchRun): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();
  const searchRoot = path.resolve(run.root ?? process.cwd());
  const renderer = new OutputRenderer(Boolean(globalOpts.json), io.stderr);

  const loaded = ConfigLoader.load({
    configPath: globalOpts.config,
    cwd: searchRoot,
    flags: run.flags,
    preset: run.preset,
  });
  const { config, warnings, sources } = loaded;
  for (const warning of warnings) {
    renderer.warn(`Config warning [${warning.field}]: ${warning.message}`);
  }
  if (globalOpts.verbose && sources.length > 0) {
    renderer.log(`Using config: ${sources.join(', ')}`);
  }

  const query = run.query ?? loaded.query;
  if (!query) {
    throw new UsageError('A search needs a query or a preset');
  }

  const session = new SearchSession({
    root: searchRoot,
    query,
    config,
    logger: createLogger(globalOpts),
  });

  const cancel = () => session.cancel();
  const stopKeys = globalOpts.json ? () => undefined : listenForCancel(io.stdin, cancel);
  process.once('SIGINT', cancel);

  let outcome: SessionOutcome;
  try {
    outcome = await session.start({ onUpdate: (_results, progress) => renderer.progress(progress) });
  } finally {
    stopKeys();
    process.off('SIGINT', cancel);
    renderer.clearProgress();
  }

  if (outcome.state === 'failed') {
    throw outcome.error ?? new AppError('UnknownError', 'Search failed');
  }
  renderer.renderOutcome(outcome, { showPreview: config.showPreview, verbose: globalOpts.verbose });
}

export function registerSearchCommand(
  program: Command,
  io: CommandIO = { stdin: process.stdin, stderr: process.stderr },
) {
  const command = program
    .command('search <query> [root]')
    .description('Search a directory tree by name, glob, content or file type')
    .addOption(
      new Option('-m, --mode <mode>', 'Match strategy').choices([...QUERY_MODES]).default('fuzzy'),
    )
    .option('-t, --threshold <n>', 'Minimum fuzzy score (0-100)', integer('--threshold', 0, 100))
    .option('-F, --literal', 'Treat a content pattern as plain text, not a regular expression')
    .option('-w, --whole-word', 'Only match content on word boundaries');

  addFilterOptions(command).action(async (query: string, root: string | undefined, options: SearchCommandOptions) => {
    await runSearch(program, io, {
      root,
      query: { mode: options.mode, text: query },
      flags: toConfigFlags(options),
    });
  });
}
