/**
 * PatternExtractor tests: style, architecture and functional families, plus
 * per-file parse failure isolation.
 */

import { Counter, PatternExtractor } from '../extractors';
import { silentLogger } from '../logging';
import { FileRecord } from '../types';

function file(relativePath: string, content: string): FileRecord {
  const dot = relativePath.lastIndexOf('.');
  return { relativePath, content, extension: relativePath.slice(dot).toLowerCase() };
}

const SERVICE_PY = `import os
import logging
from app.models import User

logger = logging.getLogger(__name__)
MAX_ITEMS = 5


def load_user(user_id, cache):
    try:
        logger.info("loading")
        return User(user_id)
    except KeyError:
        logger.error("missing")
        raise


class UserService:
    def find_all(self):
        return os.listdir(".")
`;

const MODELS_PY = `import os


class User:
    def __init__(self, user_id):
        self.user_id = user_id
`;

const TEST_PY = `from app.service import load_user


def test_load_user():
    result = load_user(1, None)
    self.assertTrue(result)
    self.assertEqual(result.user_id, 1)
`;

const PYTHON_REPO = [
  file('tests/test_service.py', TEST_PY),
  file('app/service.py', SERVICE_PY),
  file('app/models.py', MODELS_PY),
];

describe('PatternExtractor', () => {
  const extractor = new PatternExtractor(silentLogger);

  describe('style', () => {
    test('preferred indentation is the mode of observed styles', () => {
      const files = Array.from({ length: 10 }, (_, i) =>
        file(`pkg/f${i}.go`, i < 9 ? 'func a() {\n    return\n}\n' : 'func a() {\n\treturn\n}\n')
      );
      expect(extractor.extract(files).patterns.style.indentation).toBe('spaces:4');
    });

    test('line length uses the floored mean and rounded 95th percentile', () => {
      const { line_length } = extractor.extract([file('a.go', 'a\nbb\nccc\ndddd\n')]).patterns.style;
      expect(line_length).toEqual({ average: 2, preferred_max: 4 });
    });

    test('preferred_max never decreases as longer lines are added', () => {
      const base = [file('a.go', 'short line\nanother short line\n'), file('b.go', 'x'.repeat(90) + '\n')];
      const before = extractor.extract(base).patterns.style.line_length.preferred_max;
      const after = extractor.extract([...base, file('c.go', 'y'.repeat(200) + '\n')]).patterns.style.line_length
        .preferred_max;
      expect(after).toBeGreaterThanOrEqual(before);
    });

    test('defaults apply when nothing is measurable', () => {
      const { style } = extractor.extract([file('empty.go', '\n\n')]).patterns;
      expect(style.indentation).toBe('spaces:4');
      expect(style.line_length).toEqual({ average: 80, preferred_max: 100 });
      expect(style.naming_conventions).toEqual({
        variables: null,
        functions: null,
        classes: null,
        constants: null,
      });
    });

    test('naming conventions per category', () => {
      const { style } = extractor.extract(PYTHON_REPO).patterns;
      expect(style.naming_conventions).toEqual({
        variables: 'snake_case',
        functions: 'snake_case',
        classes: 'PascalCase',
        constants: 'UPPER_SNAKE_CASE',
      });
    });
  });

  describe('architecture', () => {
    const { architecture } = extractor.extract(PYTHON_REPO).patterns;

    test('common imports by root and category', () => {
      expect(architecture.common_imports).toEqual({ direct: ['os', 'logging'], from: ['app'], js_imports: [] });
    });

    test('directory structure keeps directories with more than one file', () => {
      expect(architecture.directory_structure).toEqual({ app: ['models.py', 'service.py'] });
    });

    test('error handling counts try blocks and handled types', () => {
      expect(architecture.error_handling).toEqual({ try_except: 1, except_KeyError: 1 });
    });
  });

  describe('functional', () => {
    const { functional } = extractor.extract(PYTHON_REPO).patterns;

    test('function names and arguments', () => {
      expect(functional.common_functions).toEqual({ __init__: 1, load_user: 1, find_all: 1, test_load_user: 1 });
      expect(functional.common_args).toEqual({ self: 2, user_id: 2, cache: 1 });
    });

    test('logging calls', () => {
      expect(functional.logging_patterns).toEqual({ 'logger.info': 1, 'logger.error': 1 });
    });

    test('assertions in test files', () => {
      expect(functional.test_patterns).toEqual({ assertTrue: 1, assertEqual: 1 });
    });

    test('console output is tallied under print', () => {
      const result = extractor.extract([file('src/cli.ts', "console.log('hi');\nlogger.warn('x');\n")]);
      expect(result.patterns.functional.logging_patterns).toEqual({ print: 1, 'logger.warn': 1 });
    });
  });

  test('a file that fails to parse is reported and left out', () => {
    const result = extractor.extract([...PYTHON_REPO, file('broken.py', 'def broken(:\n')]);
    expect(result.warnings).toEqual([
      { path: 'broken.py', message: 'not analyzed: broken.py: unexpected end of file inside brackets' },
    ]);
    expect(result.patterns.architecture.common_imports).toEqual(
      extractor.extract(PYTHON_REPO).patterns.architecture.common_imports
    );
  });

  test('output does not depend on input order', () => {
    expect(extractor.extract([...PYTHON_REPO].reverse())).toEqual(extractor.extract(PYTHON_REPO));
  });
});

describe('Counter', () => {
  test('mostCommon sorts by count and keeps first-seen order on ties', () => {
    const counter = new Counter();
    counter.addAll(['b', 'a', 'b', 'c', 'a']);
    expect(counter.mostCommon()).toEqual([
      ['b', 2],
      ['a', 2],
      ['c', 1],
    ]);
    expect(counter.mostCommon(1)).toEqual([['b', 2]]);
  });

  test('mode prefers the first key to reach the top count', () => {
    const counter = new Counter();
    counter.addAll(['x', 'y', 'y', 'x']);
    expect(counter.mode()).toBe('x');
    expect(new Counter().mode()).toBeUndefined();
  });
});
