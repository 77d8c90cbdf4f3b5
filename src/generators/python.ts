import type { ComponentGenerator } from '../types/generator.js';
import type { FileClaim } from '../core/staging.js';
import { renderScaffold } from '../core/scaffold.js';

const ENTRY_POINT = 'src/main.py';
const ENTRY_TEST = 'tests/test_main.py';

export const pythonGenerator: ComponentGenerator = {
  standaloneFiles: [ENTRY_POINT, ENTRY_TEST],
  generate({ spec, data, standalone }) {
    const files: FileClaim[] = [{ path: '.python-version', content: `${data.pythonVersion}\n` }];
    if (standalone) {
      files.push(
        { path: ENTRY_POINT, content: renderScaffold('python', 'main.py', data) },
        { path: ENTRY_TEST, content: renderScaffold('python', 'test_main.py', data) },
      );
    }
    if (spec.features.includes('with-examples')) {
      files.push({ path: 'examples/python_example.py', content: renderScaffold('python', 'example.py', data) });
    }
    return files;
  },
};
