import type { ComponentGenerator } from '../types/generator.js';
import type { FileClaim } from '../core/staging.js';
import { renderScaffold } from '../core/scaffold.js';

/**
 * Next.js app under `nextjs/`. It serves itself, so no standalone Node
 * server is generated next to it.
 */
export const nextjsGenerator: ComponentGenerator = {
  generate({ spec, paths, data }) {
    const files: FileClaim[] = [
      { path: paths.join('Dockerfile'), content: renderScaffold('nextjs', 'Dockerfile', data) },
      { path: paths.join('next.config.js'), content: renderScaffold('nextjs', 'next.config.js', data) },
      { path: paths.join('app', 'layout.tsx'), content: renderScaffold('nextjs', 'layout.tsx', data) },
      { path: paths.join('app', 'page.tsx'), content: renderScaffold('nextjs', 'page.tsx', data) },
    ];
    if (spec.features.includes('with-examples')) {
      files.push({
        path: paths.join('app', 'examples', 'page.tsx'),
        content: renderScaffold('nextjs', 'examples-page.tsx', data),
      });
    }
    return files;
  },
};
