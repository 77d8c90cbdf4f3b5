import type { ComponentGenerator, GeneratorContext } from '../types/generator.js';
import type { FileClaim } from '../core/staging.js';
import { renderScaffold } from '../core/scaffold.js';

/**
 * Client examples for a backing service, one per resolved ecosystem.
 * Emitted only with the `with-examples` feature.
 */
export function clientExamples({ spec, component, data }: GeneratorContext): FileClaim[] {
  if (!spec.features.includes('with-examples')) return [];
  const files: FileClaim[] = [];
  if (data.has.python) {
    files.push({
      path: `examples/${component.id}_example.py`,
      content: renderScaffold(component.id, 'example.py', data),
    });
  }
  if (data.has.node) {
    files.push({
      path: `examples/${component.id}_example.js`,
      content: renderScaffold(component.id, 'example.js', data),
    });
  }
  return files;
}

export const postgresqlGenerator: ComponentGenerator = {
  generate(ctx) {
    return [
      { path: ctx.paths.join('init', '01-init.sql'), content: renderScaffold('postgresql', 'init.sql', ctx.data) },
      ...clientExamples(ctx),
    ];
  },
};

export const mongodbGenerator: ComponentGenerator = {
  generate(ctx) {
    return [
      { path: ctx.paths.join('init', '01-init.js'), content: renderScaffold('mongodb', 'init.js', ctx.data) },
      ...clientExamples(ctx),
    ];
  },
};

export const redisGenerator: ComponentGenerator = {
  generate: clientExamples,
};

export const chromaGenerator: ComponentGenerator = {
  generate: clientExamples,
};
