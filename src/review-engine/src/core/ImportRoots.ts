import { ImportRecord } from './analyzers/SourceOutline';

/**
 * Root identifier an import is tallied and compared under.
 *
 * Python: first dotted component (`os.path` -> `os`).
 * JavaScript: package name (`@scope/pkg/sub` -> `@scope/pkg`, `lodash/fp` -> `lodash`);
 * relative and absolute paths share the root `.`.
 */
export function importRoot(record: ImportRecord): string {
  const { category, module } = record;
  if (category !== 'js_imports') {
    return module.split('.')[0] ?? module;
  }
  if (module.startsWith('.') || module.startsWith('/')) {
    return '.';
  }
  const segments = module.split('/');
  if (module.startsWith('@') && segments.length > 1) {
    return `${segments[0]}/${segments[1]}`;
  }
  return segments[0] ?? module;
}
