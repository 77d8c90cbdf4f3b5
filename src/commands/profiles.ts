import type { Command } from 'commander';
import { printTable } from '../ui/table.js';
import { heading, list } from '../ui/output.js';
import type { Runtime } from './shared.js';

export function registerProfiles(program: Command, runtime: Runtime): void {
  program
    .command('profiles')
    .description('List profiles, or show one profile in detail')
    .argument('[name]', 'Profile name')
    .action((name: string | undefined, _opts: unknown, command: Command) => {
      const { registry } = runtime;
      if (!name) {
        printTable(
          ['Profile', 'Components', 'Template', 'Description'],
          registry
            .profiles()
            .map((p) => [p.name, p.components.join(', '), p.template ?? '-', p.description]),
        );
        return;
      }

      const profile = registry.profile(name);
      if (!profile) {
        command.error(`Unknown profile "${name}"`, { exitCode: 2 });
      }
      heading(`${profile.name}: ${profile.description}`);
      list(
        registry.order(profile.components).map((id) => {
          const c = registry.lookup(id);
          return c ? `${c.id} (${c.category}) ${c.description}` : id;
        }),
      );
      if (profile.template) {
        const template = registry.template(profile.template);
        heading(`Template ${profile.template}`);
        for (const [eco, entries] of Object.entries(template?.dependencies ?? {})) {
          list(entries.map((e) => `${eco}: ${e.packageName}${e.versionConstraint}`));
        }
      }
    });
}
