import type { ComponentGenerator } from '../types/generator.js';
import type { FileClaim } from '../core/staging.js';
import { renderScaffold } from '../core/scaffold.js';

export const expressGenerator: ComponentGenerator = {
  generate({ spec, paths, data }) {
    const files: FileClaim[] = [
      { path: paths.join('Dockerfile'), content: renderScaffold('express', 'Dockerfile', data) },
      { path: paths.join('src', 'server.js'), content: renderScaffold('express', 'server.js', data) },
    ];
    if (spec.features.includes('with-examples')) {
      files.push({
        path: paths.join('src', 'routes', 'examples.js'),
        content: renderScaffold('express', 'examples.js', data),
      });
    }
    return files;
  },
};
