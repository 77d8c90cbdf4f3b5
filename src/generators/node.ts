import type { ComponentGenerator } from '../types/generator.js';
import type { FileClaim } from '../core/staging.js';
import { renderScaffold } from '../core/scaffold.js';

const ENTRY_POINT = 'src/index.js';

export const nodeGenerator: ComponentGenerator = {
  standaloneFiles: [ENTRY_POINT],
  generate({ spec, data, standalone }) {
    const files: FileClaim[] = [{ path: '.nvmrc', content: `${data.nodeVersion}\n` }];
    if (standalone) {
      files.push({ path: ENTRY_POINT, content: renderScaffold('node', 'index.js', data) });
    }
    if (spec.features.includes('with-examples')) {
      files.push({ path: 'examples/node_example.js', content: renderScaffold('node', 'example.js', data) });
    }
    return files;
  },
};
