/**
 * PythonAnalyzer - Line-structured outline of Python source.
 *
 * Python has no parser on npm that matches the interpreter, so the file is
 * reduced to logical lines (comments removed, string bodies blanked, bracket
 * and backslash continuations joined) and blocks are followed by indentation.
 */

import { SourceParseError } from '../../errors';
import {
  CallSite,
  FunctionOutline,
  LanguageConventions,
  SourceOutline,
  assertRepresentable,
  emptyOutline,
} from './SourceOutline';

const ASSERTION_METHODS = new Set(['assertEqual', 'assertTrue', 'assertFalse', 'assertRaises']);

export const PYTHON_CONVENTIONS: LanguageConventions = {
  tryConstruct: 'try_except',
  tryBlockLabel: 'try/except',
  loggingLevels: new Set(['debug', 'info', 'warning', 'error', 'critical']),
  consoleOutputLabel: 'print()',
  testFunctionPrefix: 'test_',
  isConsoleOutput: call => !call.object && call.name === 'print',
  assertionKey: call => (call.object && ASSERTION_METHODS.has(call.name) ? call.name : null),
};

const KEYWORDS = new Set([
  'and', 'as', 'assert', 'async', 'await', 'class', 'def', 'del', 'elif', 'else', 'except',
  'for', 'from', 'if', 'import', 'in', 'is', 'lambda', 'not', 'or', 'raise', 'return',
  'while', 'with', 'yield',
]);

/** Clause headers that continue a compound statement rather than start one */
const CONTINUATION_CLAUSE = /^(?:else|elif|except|finally)\b/;

const IMPORT_LINE = /^import\s+(.+)$/;
const FROM_IMPORT_LINE = /^from\s+([\w.]+)\s+import\b/;
const DEF_LINE = /^(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;
const CLASS_LINE = /^class\s+([A-Za-z_]\w*)/;
const TRY_LINE = /^try\s*:/;
const EXCEPT_LINE = /^except\b(.*?):/;
const ASSIGNMENT_LINE = /^([A-Za-z_]\w*)\s*=(?!=)/;
const CALL = /(?:([A-Za-z_]\w*)\s*\.\s*)?([A-Za-z_]\w*)\s*\(/g;
const PLAIN_NAME = /^[A-Za-z_]\w*$/;

interface LogicalLine {
  indent: number;
  text: string;
}

interface OpenFunction {
  headerIndent: number;
  bodyIndent?: number;
  outline: FunctionOutline;
}

/**
 * Split source into logical lines. Throws on unterminated strings or
 * unbalanced brackets.
 */
export function toLogicalLines(content: string, filePath: string): LogicalLine[] {
  const lines: LogicalLine[] = [];
  let current = '';
  let line = 1;
  let depth = 0;
  let i = 0;

  const flush = (): void => {
    const text = current.trim();
    if (text !== '') {
      const indent = current.length - current.trimStart().length;
      lines.push({ indent, text });
    }
    current = '';
  };

  while (i < content.length) {
    const ch = content.charAt(i);

    if (ch === '#') {
      while (i < content.length && content.charAt(i) !== '\n') i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const quote = content.startsWith(ch.repeat(3), i) ? ch.repeat(3) : ch;
      const openedAt = line;
      i += quote.length;
      let closed = false;
      while (i < content.length) {
        if (content.startsWith(quote, i)) {
          i += quote.length;
          closed = true;
          break;
        }
        const c = content.charAt(i);
        if (c === '\\') {
          if (content.charAt(i + 1) === '\n') line++;
          i += 2;
          continue;
        }
        if (c === '\n') {
          if (quote.length === 1) break;
          line++;
        }
        i++;
      }
      if (!closed) {
        throw new SourceParseError(`${filePath}:${openedAt}: unterminated string literal`, filePath);
      }
      current += '""';
      continue;
    }

    if (ch === '\\' && content.charAt(i + 1) === '\n') {
      current += ' ';
      line++;
      i += 2;
      continue;
    }

    if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      if (depth === 0) {
        throw new SourceParseError(`${filePath}:${line}: unmatched '${ch}'`, filePath);
      }
      depth--;
    }

    if (ch === '\n') {
      line++;
      i++;
      if (depth > 0) {
        current += ' ';
      } else {
        flush();
      }
      continue;
    }

    if (ch !== '\r') current += ch;
    i++;
  }

  if (depth > 0) {
    throw new SourceParseError(`${filePath}: unexpected end of file inside brackets`, filePath);
  }
  flush();
  return lines;
}

/**
 * Split a parameter list on top-level commas and keep the plain names.
 */
function parseParams(list: string): string[] {
  const params: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of list + ',') {
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    if (ch === ')' || ch === ']' || ch === '}') depth--;
    if (ch === ',' && depth === 0) {
      const name = /^\s*([A-Za-z_]\w*)/.exec(current)?.[1];
      if (name) params.push(name);
      current = '';
      continue;
    }
    current += ch;
  }
  return params;
}

/**
 * Split `def name(params) -> ret: body` into parameters and the inline body.
 */
function splitDef(text: string, openParen: number): { params: string; inlineBody: string } {
  let depth = 0;
  let close = text.length;
  for (let i = openParen; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '(') depth++;
    if (ch === ')') {
      depth--;
      if (depth === 0) {
        close = i;
        break;
      }
    }
  }
  const rest = text.slice(close + 1);
  const colon = rest.indexOf(':');
  return {
    params: text.slice(openParen + 1, close),
    inlineBody: colon === -1 ? '' : rest.slice(colon + 1).trim(),
  };
}

function extractCalls(text: string): CallSite[] {
  const calls: CallSite[] = [];
  for (const match of text.matchAll(CALL)) {
    const object = match[1];
    const name = match[2] ?? '';
    if (!object && KEYWORDS.has(name)) continue;
    calls.push(object ? { object, name } : { name });
  }
  return calls;
}

export class PythonAnalyzer {
  readonly conventions = PYTHON_CONVENTIONS;

  analyze(content: string, filePath: string): SourceOutline {
    assertRepresentable(content, filePath);

    const outline = emptyOutline('python');
    const open: OpenFunction[] = [];

    const recordCalls = (calls: CallSite[]): void => {
      for (const call of calls) {
        outline.calls.push(call);
        for (const fn of open) {
          fn.outline.calls.push(call);
        }
      }
    };

    for (const logical of toLogicalLines(content, filePath)) {
      const { indent, text } = logical;

      while (open.length > 0 && (open[open.length - 1]?.headerIndent ?? -1) >= indent) {
        open.pop();
      }
      if (!text.startsWith('@') && !CONTINUATION_CLAUSE.test(text)) {
        for (const fn of open) {
          fn.bodyIndent ??= indent;
          if (fn.bodyIndent === indent) fn.outline.bodyStatementCount++;
        }
      }

      const importMatch = IMPORT_LINE.exec(text);
      if (importMatch) {
        for (const part of (importMatch[1] ?? '').split(',')) {
          const module = part.trim().split(/\s+as\s+/)[0]?.trim() ?? '';
          if (module) outline.imports.push({ category: 'direct', module });
        }
        continue;
      }

      const fromMatch = FROM_IMPORT_LINE.exec(text);
      if (fromMatch) {
        const module = (fromMatch[1] ?? '').replace(/^\.+/, '');
        if (module) outline.imports.push({ category: 'from', module });
        continue;
      }

      const defMatch = DEF_LINE.exec(text);
      if (defMatch) {
        const { params, inlineBody } = splitDef(text, defMatch[0].length - 1);
        const fn: FunctionOutline = {
          name: defMatch[1] ?? '',
          params: parseParams(params),
          bodyStatementCount: inlineBody ? 1 : 0,
          calls: [],
        };
        outline.functions.push(fn);
        open.push({ headerIndent: indent, outline: fn });
        if (inlineBody) {
          recordCalls(extractCalls(inlineBody));
          open.pop();
        }
        continue;
      }

      const classMatch = CLASS_LINE.exec(text);
      if (classMatch) {
        outline.classes.push(classMatch[1] ?? '');
        continue;
      }

      if (TRY_LINE.test(text)) {
        outline.errorHandling.tryBlocks++;
      }

      const exceptMatch = EXCEPT_LINE.exec(text);
      if (exceptMatch) {
        const clause = (exceptMatch[1] ?? '').split(/\s+as\s+/)[0]?.trim() ?? '';
        const types = clause.replace(/^\(/, '').replace(/\)$/, '');
        for (const type of types.split(',')) {
          const name = type.trim();
          if (PLAIN_NAME.test(name)) outline.errorHandling.handledTypes.push(name);
        }
      }

      const assignment = ASSIGNMENT_LINE.exec(text);
      if (assignment?.[1]) {
        outline.assignments.push(assignment[1]);
      }

      recordCalls(extractCalls(text));
    }

    return outline;
  }
}
