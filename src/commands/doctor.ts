import type { Command } from 'commander';
import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { DISPLAY_NAME } from '../config/branding.js';
import { loadSettings } from '../config/settings.js';
import { defaultCatalogDir } from '../core/registry.js';
import { getConfigPath } from '../core/userdata.js';
import { getScaffoldsDir } from '../core/scaffold.js';
import { errorMessage } from '../core/errors.js';
import { ok, fail, warn, info } from '../ui/output.js';
import type { Runtime } from './shared.js';

function checkCommand(name: string, args: string[] = ['--version']): boolean {
  try {
    execFileSync(name, args, { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

export function registerDoctor(program: Command, runtime: Runtime): void {
  program
    .command('doctor')
    .description('Check tools and configuration')
    .action(() => {
      let problems = 0;
      console.log(`\n${DISPLAY_NAME} Doctor\n`);

      console.log('Tools:');
      for (const [tool, required] of [['git', true], ['docker', false], ['python3', false], ['node', false]] as const) {
        if (checkCommand(tool)) {
          ok(`  ${tool}: available`);
        } else if (required) {
          fail(`  ${tool}: not found`);
          problems++;
        } else {
          warn(`  ${tool}: not found`);
        }
      }
      if (checkCommand('docker', ['compose', 'version'])) {
        ok('  docker compose: available');
      } else {
        warn('  docker compose: not found');
      }
      console.log('');

      console.log('Catalog:');
      info(`  ${defaultCatalogDir()}`);
      ok(`  ${runtime.registry.all().length} components, ${runtime.registry.profiles().length} profiles, ${runtime.registry.templates().length} templates`);
      try {
        info(`  Scaffolds: ${getScaffoldsDir()}`);
      } catch (err) {
        fail(`  ${errorMessage(err)}`);
        problems++;
      }
      console.log('');

      console.log('Configuration:');
      const configPath = getConfigPath();
      if (!existsSync(configPath)) {
        info(`  ${configPath} not present, built-in defaults apply`);
      } else {
        try {
          const settings = loadSettings(configPath);
          ok(`  ${configPath} (${Object.keys(settings).length} values)`);
        } catch (err) {
          fail(`  ${errorMessage(err)}`);
          problems++;
        }
      }
      console.log('');

      if (problems > 0) {
        process.exitCode = 1;
      }
    });
}
