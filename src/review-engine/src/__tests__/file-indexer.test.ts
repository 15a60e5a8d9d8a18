/**
 * FileIndexer tests: extension and ignore-list filtering, oversize files,
 * and the soft failure on an empty result.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { FileIndexer } from '../indexer';
import { silentLogger } from '../logging';

let root: string;

async function write(relativePath: string, content: string): Promise<void> {
  const fullPath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, content);
}

const indexer = new FileIndexer({
  codeExtensions: ['.py'],
  ignoreDirs: ['node_modules', '.git'],
  maxFileSize: 50,
  logger: silentLogger,
});

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'review-engine-indexer-'));
  await write('src/app.py', 'x = 1\n');
  await write('src/util.PY', 'y = 2\n');
  await write('README.md', '# readme\n');
  await write('node_modules/lib/index.py', 'z = 3\n');
  await write('.git/hooks/hook.py', 'h = 4\n');
  await write('node_modules_backup/keep.py', 'k = 5\n');
  await write('big.py', 'x'.repeat(60));
});

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('FileIndexer', () => {
  test('indexes matching files outside ignored directories, sorted', async () => {
    const result = await indexer.index(root);
    expect(result.files.map(file => file.relativePath)).toEqual([
      'node_modules_backup/keep.py',
      'src/app.py',
      'src/util.PY',
    ]);
    expect(result.files[2]).toEqual({ relativePath: 'src/util.PY', content: 'y = 2\n', extension: '.py' });
    expect(result.diagnostic).toBeUndefined();
  });

  test('oversize files become warnings', async () => {
    const result = await indexer.index(root);
    expect(result.warnings).toEqual([{ path: 'big.py', message: 'skipped, 60 bytes exceeds 50' }]);
  });

  test('filters on whole path segments', () => {
    expect(indexer.accepts('a/.git/b.py')).toBe(false);
    expect(indexer.accepts('a/git/b.py')).toBe(true);
    expect(indexer.accepts('a/b.txt')).toBe(false);
  });

  test('missing root is a soft failure', async () => {
    const result = await indexer.index(path.join(root, 'missing'));
    expect(result.files).toEqual([]);
    expect(result.diagnostic).toMatch(/^Repository root .* is not readable/);
  });

  test('no matching files gives a diagnostic naming the filters', async () => {
    const docsRoot = path.join(root, 'docs-only');
    await fs.mkdir(docsRoot, { recursive: true });
    await fs.writeFile(path.join(docsRoot, 'guide.md'), '# guide\n');

    const result = await indexer.index(docsRoot);
    expect(result.files).toEqual([]);
    expect(result.diagnostic).toBe(
      `No files found in ${docsRoot} matching extensions [.py] outside ignored directories [node_modules, .git]`
    );
  });
});
