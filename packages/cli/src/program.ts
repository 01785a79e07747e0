import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import { AppError, UsageError, exitCodeForError } from '@treescout/shared';
import { registerPresetCommands } from './commands/preset';
import { registerSearchCommand, type CommandIO } from './commands/search';
import type { GlobalOptions } from './types';

export const name = '@treescout/cli';

function readVersion(): string {
  const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export function createProgram(io?: CommandIO): Command {
  const program = new Command();

  program
    .name('treescout')
    .description('Incremental file and content search for large directory trees')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured session events to a JSONL file')
    .exitOverride();

  registerSearchCommand(program, io);
  registerPresetCommands(program, io);
  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    console.log(
      JSON.stringify({
        error:
          e instanceof AppError
            ? { code: e.code, message: e.message, details: e.details }
            : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) },
      }),
    );
    return;
  }

  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(`  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`);
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Runs the CLI and resolves with the process exit code: 0 for a completed or
 * cancelled search, 1 when it failed, 2 for configuration and usage errors.
 */
export async function main(argv: string[] = process.argv, io?: CommandIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    const opts = program.opts<GlobalOptions>();
    if (e instanceof CommanderError) {
      // --help and --version end parsing with exit code 0.
      if (e.exitCode === 0) {
        return 0;
      }
      // Commander has already printed its own message.
      const usage = new UsageError(e.message, { cause: e });
      if (opts.json) reportError(usage, opts);
      return exitCodeForError(usage);
    }
    reportError(e, opts);
    return exitCodeForError(e);
  }
}
