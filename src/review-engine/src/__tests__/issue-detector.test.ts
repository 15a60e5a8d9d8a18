/**
 * IssueDetector tests: every style, architecture and functionality rule,
 * skipped checks for absent patterns, and idempotence.
 */

import { IssueDetector, PatternSource } from '../detector';
import { KnowledgeUnavailableError } from '../errors';
import { silentLogger } from '../logging';
import { SimilarCodeResult, StoredPatterns } from '../types';

const PATTERNS: StoredPatterns = {
  style: {
    indentation: 'spaces:4',
    line_length: { average: 40, preferred_max: 100 },
    naming_conventions: {
      variables: 'snake_case',
      functions: 'snake_case',
      classes: 'PascalCase',
      constants: 'UPPER_SNAKE_CASE',
    },
  },
  architecture: {
    common_imports: { direct: ['os', 'json'], from: ['app'], js_imports: ['react', '.'] },
    error_handling: { try_except: 2 },
  },
  functional: {
    logging_patterns: { 'logger.info': 3 },
    test_patterns: { assertEqual: 2 },
  },
};

class FakeStore implements PatternSource {
  retrieved: Array<{ snippet: string; k: number }> = [];

  constructor(
    private patterns: StoredPatterns | null,
    private similar: SimilarCodeResult[] = []
  ) {}

  getPatterns(): StoredPatterns | null {
    return this.patterns;
  }

  async retrieveSimilar(snippet: string, k: number): Promise<SimilarCodeResult[]> {
    this.retrieved.push({ snippet, k });
    return this.similar;
  }
}

const detector = new IssueDetector(new FakeStore(PATTERNS), { similarResults: 5, logger: silentLogger });

function detect(code: string, filePath: string, patterns: StoredPatterns = PATTERNS) {
  return detector.detect(code, filePath, patterns);
}

describe('IssueDetector', () => {
  test('conforming code has no issues', () => {
    const code = 'import os\nfrom app.models import User\n\n\ndef load_user(user_id):\n    return User(user_id)\n';
    expect(detect(code, 'app/users.py')).toEqual({ style: [], architecture: [], functionality: [] });
  });

  describe('style', () => {
    test('indentation differing from the project standard', () => {
      expect(detect('def f():\n\treturn 1\n', 'app/f.py').style).toEqual([
        {
          type: 'style',
          subtype: 'indentation',
          message: 'Indentation uses tabs, but project standard is spaces:4',
          severity: 'low',
        },
      ]);
    });

    test('one line over the maximum gives one issue naming that line', () => {
      const code = `x = 1\ny = ${'1'.repeat(116)}\n`;
      expect(detect(code, 'app/long.py').style).toEqual([
        {
          type: 'style',
          subtype: 'line_length',
          message: 'Lines exceed maximum length of 100 characters: 2',
          severity: 'low',
        },
      ]);
    });

    test('many long lines are summarized', () => {
      const long = `z = ${'2'.repeat(100)}`;
      const code = [long, long, long, long, long].join('\n');
      expect(detect(code, 'app/long.py').style[0]?.message).toBe(
        'Lines exceed maximum length of 100 characters: 1, 2, ... and 3 more'
      );
    });

    test('names outside the preferred conventions', () => {
      const code = 'userName = 1\n\n\nclass data_loader:\n    pass\n\n\ndef LoadData():\n    pass\n';
      expect(detect(code, 'app/names.py').style.map(issue => issue.message)).toEqual([
        "Variable name 'userName' uses camelCase convention, but project standard is snake_case",
        "Function name 'LoadData' uses PascalCase convention, but project standard is snake_case",
        "Class name 'data_loader' uses snake_case convention, but project standard is PascalCase",
      ]);
    });

    test('constant-shaped assignments are checked against the variables convention', () => {
      expect(detect('MAX = 1\n', 'app/consts.py').style.map(issue => issue.message)).toEqual([
        "Variable name 'MAX' uses PascalCase convention, but project standard is snake_case",
      ]);
    });
  });

  describe('architecture', () => {
    test('uncommon direct and from imports', () => {
      const code = 'import os\nimport requests\nimport numpy.linalg\nfrom flask import Flask\n';
      expect(detect(code, 'app/deps.py').architecture).toEqual([
        {
          type: 'architecture',
          subtype: 'uncommon_import',
          message: 'Uncommon imports detected: requests, numpy.linalg',
          severity: 'medium',
        },
        {
          type: 'architecture',
          subtype: 'uncommon_from_import',
          message: 'Uncommon from imports detected: flask',
          severity: 'low',
        },
      ]);
    });

    test('uncommon JavaScript imports compare by package', () => {
      const code = "import React from 'react';\nimport axios from 'axios';\nimport { a } from './a';\n";
      expect(detect(code, 'src/app.ts').architecture).toEqual([
        {
          type: 'architecture',
          subtype: 'uncommon_js_import',
          message: 'Uncommon imports detected: axios',
          severity: 'low',
        },
      ]);
    });

    test('an empty learned list flags every import', () => {
      const patterns: StoredPatterns = { architecture: { common_imports: { direct: [] } } };
      expect(detect('import os\n', 'app/a.py', patterns).architecture.map(issue => issue.message)).toEqual([
        'Uncommon imports detected: os',
      ]);
    });

    const LONG_FUNCTIONS = [
      'def process(items):',
      '    a = 1',
      '    b = 2',
      '    c = 3',
      '    d = 4',
      '    e = 5',
      '    return a',
      '',
      '',
      'def process_more(items):',
      '    a = 1',
      '    b = 2',
      '    c = 3',
      '    d = 4',
      '    e = 5',
      '    return a',
      '',
    ].join('\n');

    test('non-trivial functions without try blocks get one issue per file', () => {
      expect(detect(LONG_FUNCTIONS, 'app/proc.py').architecture).toEqual([
        {
          type: 'architecture',
          subtype: 'error_handling',
          message: 'Function lacks error handling. Consider adding try/except blocks based on project patterns.',
          severity: 'medium',
        },
      ]);
    });

    test('any try block in the file satisfies the check', () => {
      const code = `${LONG_FUNCTIONS}\n\ndef safe():\n    try:\n        run()\n    except ValueError:\n        pass\n`;
      expect(detect(code, 'app/proc.py').architecture).toEqual([]);
    });

    test('short functions do not need error handling', () => {
      expect(detect('def short():\n    a = 1\n    return a\n', 'app/short.py').architecture).toEqual([]);
    });

    test('skipped without learned error handling', () => {
      const patterns: StoredPatterns = { architecture: { common_imports: {} } };
      expect(detect(LONG_FUNCTIONS, 'app/proc.py', patterns).architecture).toEqual([]);
    });
  });

  describe('functionality', () => {
    test('console output where the project logs', () => {
      expect(detect('def run():\n    print("hi")\n', 'app/run.py').functionality).toEqual([
        {
          type: 'functionality',
          subtype: 'logging',
          message:
            'Using print() for output, but project uses a logging framework. Consider using the appropriate logging methods.',
          severity: 'medium',
        },
      ]);
    });

    test('console output in TypeScript', () => {
      expect(detect("console.log('hi');\n", 'src/run.ts').functionality.map(issue => issue.message)).toEqual([
        'Using console.log() for output, but project uses a logging framework. Consider using the appropriate logging methods.',
      ]);
    });

    test('no logging issue when the file also logs or the project prints', () => {
      expect(detect('print("a")\nlogger.info("b")\n', 'app/run.py').functionality).toEqual([]);
      const printing: StoredPatterns = { functional: { logging_patterns: { print: 4, 'logger.info': 1 } } };
      expect(detect('print("a")\n', 'app/run.py', printing).functionality).toEqual([]);
    });

    test('a test file without assertions gets exactly one issue', () => {
      const code = 'def test_a():\n    run()\n\n\ndef helper():\n    go()\n\n\ndef other():\n    go()\n';
      expect(detect(code, 'tests/test_users.py').functionality).toEqual([
        {
          type: 'functionality',
          subtype: 'testing',
          message: 'Test file lacks assertions. Consider adding appropriate test assertions.',
          severity: 'high',
        },
      ]);
    });

    test('a test file with assertions passes', () => {
      const code = 'def test_a():\n    self.assertEqual(run(), 1)\n';
      expect(detect(code, 'tests/test_users.py').functionality).toEqual([]);
    });
  });

  test('absent pattern families skip their checks', () => {
    const code = 'import requests\n\n\ndef Bad():\n\tprint("x")\n';
    expect(detect(code, 'tests/test_bad.py', {})).toEqual({ style: [], architecture: [], functionality: [] });
  });

  test('unparsable code still gets text-level style checks', () => {
    expect(detect('def broken(:\n\tx\n', 'app/broken.py')).toEqual({
      style: [
        {
          type: 'style',
          subtype: 'indentation',
          message: 'Indentation uses tabs, but project standard is spaces:4',
          severity: 'low',
        },
      ],
      architecture: [],
      functionality: [],
    });
  });

  test('detection is idempotent', () => {
    const code = 'import requests\nuserName = 1\n\n\ndef run():\n\tprint("x")\n';
    expect(detect(code, 'app/run.py')).toEqual(detect(code, 'app/run.py'));
  });

  describe('analyze', () => {
    const similar: SimilarCodeResult[] = [{ content: 'def load(): pass', file: 'app/a.py', chunk: 0, similarity: 0.9 }];

    test('adds similar code and passes the diff through', async () => {
      const store = new FakeStore(PATTERNS, similar);
      const withStore = new IssueDetector(store, { similarResults: 3, logger: silentLogger });

      const analysis = await withStore.analyze('x = 1\n', 'app/x.py', '--- a/app/x.py');
      expect(analysis).toEqual({
        issues: { style: [], architecture: [], functionality: [] },
        similarCode: similar,
        diff: '--- a/app/x.py',
      });
      expect(store.retrieved).toEqual([{ snippet: 'x = 1\n', k: 3 }]);

      const plain = await withStore.analyze('x = 1\n', 'app/x.py');
      expect('diff' in plain).toBe(false);
    });

    test('retrieval failure leaves similar code empty', async () => {
      const failing: PatternSource = {
        getPatterns: () => PATTERNS,
        retrieveSimilar: async () => {
          throw new Error('index offline');
        },
      };
      const analysis = await new IssueDetector(failing, { similarResults: 3, logger: silentLogger }).analyze(
        'x = 1\n',
        'app/x.py'
      );
      expect(analysis.similarCode).toEqual([]);
    });

    test('throws when no patterns are loaded', async () => {
      const empty = new IssueDetector(new FakeStore(null), { similarResults: 3, logger: silentLogger });
      await expect(empty.analyze('x = 1\n', 'app/x.py')).rejects.toThrow(KnowledgeUnavailableError);
    });
  });
});
