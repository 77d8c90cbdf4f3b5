import type { Command } from 'commander';
import { join, resolve } from 'node:path';
import { runEngine } from '../core/engine.js';
import { gitInitializer } from '../core/vcs.js';
import type { Registry } from '../core/registry.js';
import type { SelectionInput } from '../config/schema.js';
import { withSpinner } from '../ui/spinner.js';
import { askCheckbox, askSelect } from '../ui/prompts.js';
import {
  addSelectionOptions,
  parseCommonOptions,
  reportOutcome,
  selectionFromOptions,
  type Runtime,
} from './shared.js';

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const CUSTOM = '__custom__';

async function promptSelection(registry: Registry, selection: SelectionInput): Promise<SelectionInput> {
  const profile = await askSelect('Start from a profile?', [
    ...registry.profiles().map((p) => ({ name: p.name, value: p.name, description: p.description })),
    { name: 'custom selection', value: CUSTOM },
  ]);
  if (profile !== CUSTOM) return { ...selection, profile };

  const components = await askCheckbox(
    'Select components',
    registry.all().map((c) => ({ name: `${c.id} (${c.category})`, value: c.id, description: c.description })),
  );
  return { ...selection, components };
}

export function registerCreate(program: Command, runtime: Runtime): void {
  const cmd = program
    .command('create')
    .description('Create a new project from components or a profile')
    .argument('<name>', 'Project name, also the directory name')
    .option('-d, --dir <parent>', 'Parent directory for the project', '.')
    .option('-i, --interactive', 'Choose a profile or components interactively');
  const flags = addSelectionOptions(cmd, runtime.registry);

  cmd.action(async (name: string, _opts: unknown, command: Command) => {
    if (!NAME_PATTERN.test(name)) {
      command.error(`Invalid project name "${name}": use letters, digits, ".", "_" or "-"`);
    }
    const opts = command.opts();
    const common = parseCommonOptions(opts);
    const parent = typeof opts.dir === 'string' ? opts.dir : '.';

    let selection = selectionFromOptions(opts, flags, {
      targetDir: resolve(join(parent, name)),
      mode: 'create',
      projectName: name,
    });
    if (opts.interactive === true && !selection.profile && (selection.components ?? []).length === 0) {
      selection = await promptSelection(runtime.registry, selection);
    }

    const outcome = await withSpinner(
      common.dryRun ? `Resolving ${name}` : `Creating ${name}`,
      () =>
        runEngine(selection, {
          registry: runtime.registry,
          generators: runtime.generators,
          settings: runtime.settings,
          dryRun: common.dryRun,
          vcs: gitInitializer,
        }),
      (o) => o.kind === 'success',
    );
    process.exitCode = reportOutcome(outcome, common.dryRun === true);
  });
}
