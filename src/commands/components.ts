import type { Command } from 'commander';
import { printTable } from '../ui/table.js';
import type { Runtime } from './shared.js';

export function registerComponents(program: Command, runtime: Runtime): void {
  program
    .command('components')
    .description('List available components')
    .option('--json', 'Print components as JSON')
    .action((opts: { json?: boolean }) => {
      const components = runtime.registry.all();
      if (opts.json) {
        console.log(JSON.stringify(components, null, 2));
        return;
      }
      printTable(
        ['Component', 'Category', 'Ecosystem', 'Implies', 'Conflicts', 'Port'],
        components.map((c) => [
          c.id,
          c.category,
          c.ecosystem ?? '-',
          c.implies.join(', ') || '-',
          c.conflicts.join(', ') || '-',
          c.service ? String(c.service.defaultPort) : '-',
        ]),
      );
    });
}
