import type { Command } from 'commander';
import { resolve } from 'node:path';
import { runEngine } from '../core/engine.js';
import { withSpinner } from '../ui/spinner.js';
import {
  addSelectionOptions,
  parseCommonOptions,
  reportOutcome,
  selectionFromOptions,
  type Runtime,
} from './shared.js';

export function registerAdd(program: Command, runtime: Runtime): void {
  const cmd = program
    .command('add')
    .description('Add components to an existing project')
    .option('-d, --dir <path>', 'Project directory', '.');
  const flags = addSelectionOptions(cmd, runtime.registry);

  cmd.action(async (_opts: unknown, command: Command) => {
    const opts = command.opts();
    const common = parseCommonOptions(opts);
    const targetDir = resolve(typeof opts.dir === 'string' ? opts.dir : '.');
    const selection = selectionFromOptions(opts, flags, { targetDir, mode: 'add' });

    const outcome = await withSpinner(
      `Updating ${targetDir}`,
      () =>
        runEngine(selection, {
          registry: runtime.registry,
          generators: runtime.generators,
          settings: runtime.settings,
          dryRun: common.dryRun,
        }),
      (o) => o.kind === 'success',
    );
    process.exitCode = reportOutcome(outcome, common.dryRun === true);
  });
}
