import { join } from 'node:path';
import { readFileSync, existsSync } from 'node:fs';
import Handlebars from 'handlebars';
import { GenerationError, errorMessage } from './errors.js';
import { packageRoot } from '../utils/fs.js';

export interface ScaffoldData {
  projectName: string;
  pythonVersion: string;
  nodeVersion: string;
  /** Resolved component ids, for `{{#if has.postgresql}}` blocks. */
  has: Record<string, boolean>;
  withExamples: boolean;
  [key: string]: unknown;
}

const SCAFFOLDS_DIR = 'scaffolds';

const cache = new Map<string, Handlebars.TemplateDelegate>();

const hbs = Handlebars.create();
hbs.registerHelper('json', (value: unknown) => JSON.stringify(value));

export function getScaffoldsDir(): string {
  const candidate = join(packageRoot(), SCAFFOLDS_DIR);
  if (existsSync(candidate)) return candidate;
  throw new Error('Scaffolds directory not found');
}

function compile(set: string, name: string): Handlebars.TemplateDelegate {
  const key = `${set}/${name}`;
  const cached = cache.get(key);
  if (cached) return cached;
  const path = join(getScaffoldsDir(), set, `${name}.hbs`);
  if (!existsSync(path)) {
    throw new GenerationError(`Scaffold template missing`, [key]);
  }
  const template = hbs.compile(readFileSync(path, 'utf-8'), { noEscape: true, strict: true });
  cache.set(key, template);
  return template;
}

/** Renders `scaffolds/<set>/<name>.hbs`. */
export function renderScaffold(set: string, name: string, data: ScaffoldData): string {
  const template = compile(set, name);
  try {
    return template(data);
  } catch (err) {
    throw new GenerationError(`Scaffold ${set}/${name} failed: ${errorMessage(err)}`);
  }
}

/** Renders an inline catalog value such as `postgres:{{version}}`. */
export function renderValue(value: string, data: Record<string, unknown>): string {
  try {
    return hbs.compile(value, { noEscape: true, strict: true })(data);
  } catch (err) {
    throw new GenerationError(`Template "${value}" failed: ${errorMessage(err)}`);
  }
}
