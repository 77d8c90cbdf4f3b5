#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DESCRIPTION } from './config/branding.js';
import { errorMessage } from './core/errors.js';
import { fail } from './ui/output.js';
import { logger } from './utils/logger.js';
import { loadRuntime, type Runtime } from './commands/shared.js';
import {
  registerCreate,
  registerAdd,
  registerProfiles,
  registerComponents,
  registerConfig,
  registerDoctor,
  registerVersion,
} from './commands/index.js';

let runtime: Runtime;
try {
  runtime = loadRuntime();
} catch (err) {
  fail(`Cannot load catalog: ${errorMessage(err)}`);
  process.exit(1);
}

const program = new Command()
  .name(APP_NAME)
  .description(DESCRIPTION)
  .enablePositionalOptions()
  .option('--verbose', 'Log engine steps to stderr')
  .showHelpAfterError(true)
  .hook('preAction', (cmd) => {
    if (cmd.opts().verbose === true) logger.setLevel('debug');
  });

// Register all commands
registerCreate(program, runtime);
registerAdd(program, runtime);
registerProfiles(program, runtime);
registerComponents(program, runtime);
registerConfig(program);
registerDoctor(program, runtime);
registerVersion(program);

await program.parseAsync();
