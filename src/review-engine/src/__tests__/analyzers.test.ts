/**
 * Source analyzer tests: TypeScript/JavaScript outlines via the compiler
 * API, Python outlines via logical lines.
 */

import { PythonAnalyzer, SourceAnalyzer, TypeScriptAnalyzer } from '../core';
import { toLogicalLines } from '../core/analyzers/PythonAnalyzer';
import { SourceParseError } from '../errors';

const TS_SOURCE = `import { readFile } from 'fs/promises';
import * as path from 'path';
import type { Foo } from './foo';
export { bar } from '@scope/pkg/sub';
const lodash = require('lodash');

const MAX_RETRIES = 3;
let counter = 0;

export class UserService {
  constructor(private logger: Logger) {}

  async loadUser(id: string, options?: object) {
    try {
      this.logger.info('loading');
      return await readFile(id);
    } catch (error) {
      if (error instanceof NotFoundError) {
        console.log('missing');
      }
      throw error;
    }
  }
}

const format = (value: string) => value.trim();

function helper(a: number) {
  return a + 1;
}
`;

describe('TypeScriptAnalyzer', () => {
  const analyzer = new TypeScriptAnalyzer();
  const outline = analyzer.analyze(TS_SOURCE, 'src/user.ts');

  test('records every import form in source order', () => {
    expect(outline.imports).toEqual([
      { category: 'js_imports', module: 'fs/promises' },
      { category: 'js_imports', module: 'path' },
      { category: 'js_imports', module: './foo' },
      { category: 'js_imports', module: '@scope/pkg/sub' },
      { category: 'js_imports', module: 'lodash' },
    ]);
  });

  test('separates assignments from function-valued declarations', () => {
    expect(outline.assignments).toEqual(['lodash', 'MAX_RETRIES', 'counter']);
    expect(outline.functions.map(fn => fn.name)).toEqual(['loadUser', 'format', 'helper']);
    expect(outline.classes).toEqual(['UserService']);
  });

  test('captures parameters and body size', () => {
    const [loadUser, format, helper] = outline.functions;
    expect(loadUser?.params).toEqual(['id', 'options']);
    expect(loadUser?.bodyStatementCount).toBe(1);
    expect(format?.params).toEqual(['value']);
    expect(format?.bodyStatementCount).toBe(1);
    expect(helper?.params).toEqual(['a']);
  });

  test('records try blocks and instanceof tests inside catch', () => {
    expect(outline.errorHandling).toEqual({ tryBlocks: 1, handledTypes: ['NotFoundError'] });
  });

  test('records call sites with their receiver', () => {
    expect(outline.calls).toEqual([
      { name: 'require' },
      { object: 'logger', name: 'info' },
      { name: 'readFile' },
      { object: 'console', name: 'log' },
      { object: 'value', name: 'trim' },
    ]);
    expect(outline.functions[0]?.calls).toEqual([
      { object: 'logger', name: 'info' },
      { name: 'readFile' },
      { object: 'console', name: 'log' },
    ]);
  });

  test('marks JavaScript files as javascript', () => {
    expect(analyzer.analyze('const a = 1;\n', 'lib/a.js').language).toBe('javascript');
    expect(outline.language).toBe('typescript');
  });

  test('throws SourceParseError on syntax errors', () => {
    expect(() => analyzer.analyze('function broken( {\n', 'bad.ts')).toThrow(SourceParseError);
  });

  test('throws SourceParseError on NUL characters', () => {
    expect(() => analyzer.analyze('const a = 1;\u0000', 'nul.ts')).toThrow('nul.ts contains NUL characters');
  });

  test('classifies console, logging and assertion calls', () => {
    const { conventions } = analyzer;
    expect(conventions.isConsoleOutput({ object: 'console', name: 'log' })).toBe(true);
    expect(conventions.assertionKey({ name: 'expect' })).toBe('expect');
    expect(conventions.assertionKey({ object: 'assert', name: 'equal' })).toBe('assert.equal');
    expect(conventions.assertionKey({ object: 'chai', name: 'expect' })).toBeNull();
  });
});

const PY_SOURCE = `import os, sys as system
import json
from collections import OrderedDict
from .models import User
from . import helpers

MAX_SIZE = 10
total = 0


@decorator
def process_items(self, items, *args, limit=5, **kwargs):
    """Docstring."""
    result = []
    for item in items:
        print(item)
    try:
        logger.info("done")
    except (ValueError, KeyError) as exc:
        raise
    except Exception:
        pass
    return result


class DataLoader(Base):
    def load(self): return self.fetch()

    def test_load(self):
        self.assertEqual(1, 1)
`;

describe('PythonAnalyzer', () => {
  const analyzer = new PythonAnalyzer();
  const outline = analyzer.analyze(PY_SOURCE, 'app/loader.py');

  test('records direct and from imports', () => {
    expect(outline.imports).toEqual([
      { category: 'direct', module: 'os' },
      { category: 'direct', module: 'sys' },
      { category: 'direct', module: 'json' },
      { category: 'from', module: 'collections' },
      { category: 'from', module: 'models' },
    ]);
  });

  test('records assignments, functions and classes', () => {
    expect(outline.assignments).toEqual(['MAX_SIZE', 'total', 'result']);
    expect(outline.functions.map(fn => fn.name)).toEqual(['process_items', 'load', 'test_load']);
    expect(outline.classes).toEqual(['DataLoader']);
  });

  test('keeps named parameters only', () => {
    expect(outline.functions[0]?.params).toEqual(['self', 'items', 'limit']);
  });

  test('counts top-level body statements, docstring included', () => {
    expect(outline.functions.map(fn => fn.bodyStatementCount)).toEqual([5, 1, 1]);
  });

  test('records try blocks and handled exception types', () => {
    expect(outline.errorHandling).toEqual({
      tryBlocks: 1,
      handledTypes: ['ValueError', 'KeyError', 'Exception'],
    });
  });

  test('attributes calls to enclosing functions', () => {
    expect(outline.calls).toEqual([
      { name: 'print' },
      { object: 'logger', name: 'info' },
      { object: 'self', name: 'fetch' },
      { object: 'self', name: 'assertEqual' },
    ]);
    expect(outline.functions[0]?.calls).toEqual([{ name: 'print' }, { object: 'logger', name: 'info' }]);
    expect(outline.functions[2]?.calls).toEqual([{ object: 'self', name: 'assertEqual' }]);
  });

  test('throws SourceParseError on malformed source', () => {
    expect(() => analyzer.analyze('x = "open\n', 'a.py')).toThrow(SourceParseError);
    expect(() => analyzer.analyze('foo(1))\n', 'b.py')).toThrow("b.py:1: unmatched ')'");
    expect(() => analyzer.analyze('foo(1,\n', 'c.py')).toThrow('c.py: unexpected end of file inside brackets');
  });
});

describe('toLogicalLines', () => {
  test('joins bracket and backslash continuations', () => {
    const lines = toLogicalLines('value = compute(\n    1,\n    2,\n)\ntotal = 1 + \\\n    2\n', 'x.py');
    expect(lines.map(line => line.text.replace(/\s+/g, ' '))).toEqual([
      'value = compute( 1, 2, )',
      'total = 1 + 2',
    ]);
  });

  test('blanks strings so their content is not analyzed', () => {
    const lines = toLogicalLines('s = "# not a comment (" # real comment\n', 'x.py');
    expect(lines).toEqual([{ indent: 0, text: 's = ""' }]);
  });
});

describe('SourceAnalyzer', () => {
  const analyzer = new SourceAnalyzer();

  test('routes by extension and skips other languages', () => {
    expect(analyzer.analyze('x = 1\n', 'a.py')?.conventions.tryConstruct).toBe('try_except');
    expect(analyzer.analyze('let x = 1;\n', 'a.ts')?.conventions.tryConstruct).toBe('try_catch');
    expect(analyzer.analyze('package main\n', 'main.go')).toBeNull();
    expect(analyzer.supports('main.go')).toBe(false);
  });
});
