import path from 'node:path';
import { Command } from 'commander';
import { ConfigLoader } from '../config/loader';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../types';
import { addFilterOptions, runSearch, toConfigFlags, type CommandIO, type FilterOptions } from './search';

export function registerPresetCommands(
  program: Command,
  io: CommandIO = { stdin: process.stdin, stderr: process.stderr },
) {
  const command = program
    .command('preset <name> [root]')
    .description('Run a named search (see `treescout presets`); flags override its options');

  addFilterOptions(command).action(async (name: string, root: string | undefined, options: FilterOptions) => {
    await runSearch(program, io, { root, preset: name, flags: toConfigFlags(options) });
  });

  program
    .command('presets')
    .description('List the built-in presets and those defined in config files')
    .action(() => {
      const globalOpts = program.opts<GlobalOptions>();
      const { presets } = ConfigLoader.load({ configPath: globalOpts.config, cwd: path.resolve(process.cwd()) });
      new OutputRenderer(Boolean(globalOpts.json), io.stderr).renderPresets(presets);
    });
}
