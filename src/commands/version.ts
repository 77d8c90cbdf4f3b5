import type { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { APP_NAME } from '../config/branding.js';
import { packageRoot } from '../utils/fs.js';

const PackageJsonSchema = z.object({ version: z.string() }).passthrough();

export function currentVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(packageRoot(), 'package.json'), 'utf-8'));
  const parsed = PackageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : 'dev';
}

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const version = currentVersion();

      if (opts.short) {
        console.log(version);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify({ name: APP_NAME, version, node: process.version }, null, 2));
        return;
      }

      console.log(`${APP_NAME} version ${version} (node ${process.version})`);
    });
}
