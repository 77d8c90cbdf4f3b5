import type { Command } from 'commander';
import { VERSION_KEYS } from '../config/schema.js';
import { isSettingKey, loadSettings, saveSetting } from '../config/settings.js';
import { getConfigPath } from '../core/userdata.js';
import { validateVersion } from '../core/versions.js';
import { errorMessage } from '../core/errors.js';
import { ok } from '../ui/output.js';
import { printTable } from '../ui/table.js';

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage global version defaults');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', `One of: ${VERSION_KEYS.join(', ')}`)
    .argument('<value>', 'Config value')
    .action((key: string, value: string, _opts: unknown, command: Command) => {
      if (!isSettingKey(key)) {
        command.error(`Unknown key "${key}". Expected one of: ${VERSION_KEYS.join(', ')}`);
      }
      try {
        saveSetting(getConfigPath(), key, validateVersion(key, value));
      } catch (err) {
        command.error(errorMessage(err));
      }
      ok(`Set ${key} = ${value}`);
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string, _opts: unknown, command: Command) => {
      if (!isSettingKey(key)) {
        command.error(`Unknown key "${key}". Expected one of: ${VERSION_KEYS.join(', ')}`);
      }
      const value = loadSettings(getConfigPath())[key];
      if (value) {
        console.log(value);
      }
    });

  cmd
    .command('list')
    .description('List configured values')
    .action(() => {
      const settings = loadSettings(getConfigPath());
      printTable(
        ['Key', 'Value'],
        VERSION_KEYS.map((k) => [k, settings[k] ?? '(default)']),
      );
    });
}
