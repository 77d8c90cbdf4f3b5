import type { ComponentGenerator } from '../types/generator.js';
import type { FileClaim } from '../core/staging.js';
import { renderScaffold } from '../core/scaffold.js';

/** FastAPI service under `fastapi/`, built from the root requirements.txt. */
export const fastapiGenerator: ComponentGenerator = {
  generate({ spec, paths, data }) {
    const files: FileClaim[] = [
      { path: paths.join('Dockerfile'), content: renderScaffold('fastapi', 'Dockerfile', data) },
      { path: paths.join('main.py'), content: renderScaffold('fastapi', 'main.py', data) },
      { path: paths.join('tests', 'test_main.py'), content: renderScaffold('fastapi', 'test_main.py', data) },
    ];
    if (spec.features.includes('with-examples')) {
      files.push({
        path: paths.join('routers', 'examples.py'),
        content: renderScaffold('fastapi', 'examples.py', data),
      });
    }
    return files;
  },
};
