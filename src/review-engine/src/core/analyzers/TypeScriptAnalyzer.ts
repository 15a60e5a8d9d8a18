/**
 * TypeScriptAnalyzer - Outlines TypeScript and JavaScript files using the
 * TypeScript compiler's own parser.
 */

import * as path from 'path';
import * as ts from 'typescript';
import { SourceParseError } from '../../errors';
import {
  CallSite,
  FunctionOutline,
  LanguageConventions,
  SourceOutline,
  assertRepresentable,
  emptyOutline,
} from './SourceOutline';

export const TYPESCRIPT_CONVENTIONS: LanguageConventions = {
  tryConstruct: 'try_catch',
  tryBlockLabel: 'try/catch',
  loggingLevels: new Set(['debug', 'info', 'warn', 'warning', 'error', 'critical', 'fatal', 'trace']),
  consoleOutputLabel: 'console.log()',
  testFunctionPrefix: 'test',
  isConsoleOutput: call => call.object === 'console',
  assertionKey: call => {
    if (!call.object && (call.name === 'expect' || call.name === 'assert')) {
      return call.name;
    }
    if (call.object === 'assert') {
      return `assert.${call.name}`;
    }
    return null;
  },
};

function scriptKindFor(filePath: string): ts.ScriptKind {
  switch (path.extname(filePath).toLowerCase()) {
    case '.tsx':
      return ts.ScriptKind.TSX;
    case '.jsx':
      return ts.ScriptKind.JSX;
    case '.js':
    case '.mjs':
    case '.cjs':
      return ts.ScriptKind.JS;
    default:
      return ts.ScriptKind.TS;
  }
}

export class TypeScriptAnalyzer {
  readonly conventions = TYPESCRIPT_CONVENTIONS;

  analyze(content: string, filePath: string): SourceOutline {
    assertRepresentable(content, filePath);
    this.checkSyntax(content, filePath);

    const kind = scriptKindFor(filePath);
    const sourceFile = ts.createSourceFile(filePath, content, ts.ScriptTarget.Latest, true, kind);

    const outline = emptyOutline(
      kind === ts.ScriptKind.JS || kind === ts.ScriptKind.JSX ? 'javascript' : 'typescript'
    );
    const frames: FunctionOutline[] = [];

    const recordCall = (call: CallSite): void => {
      outline.calls.push(call);
      for (const frame of frames) {
        frame.calls.push(call);
      }
    };

    const enterFunction = (name: string, fn: ts.SignatureDeclaration, body: ts.Node | undefined): void => {
      const frame: FunctionOutline = {
        name,
        params: fn.parameters
          .map(param => (ts.isIdentifier(param.name) ? param.name.text : ''))
          .filter(param => param !== '' && param !== 'this'),
        bodyStatementCount: body === undefined ? 0 : ts.isBlock(body) ? body.statements.length : 1,
        calls: [],
      };
      outline.functions.push(frame);
      frames.push(frame);
      ts.forEachChild(fn, child => visit(child, false));
      frames.pop();
    };

    const visit = (node: ts.Node, inCatch: boolean): void => {
      if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
        if (node.moduleSpecifier && ts.isStringLiteral(node.moduleSpecifier)) {
          outline.imports.push({ category: 'js_imports', module: node.moduleSpecifier.text });
        }
      } else if (ts.isImportEqualsDeclaration(node)) {
        const ref = node.moduleReference;
        if (ts.isExternalModuleReference(ref) && ts.isStringLiteral(ref.expression)) {
          outline.imports.push({ category: 'js_imports', module: ref.expression.text });
        }
      }

      if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name) && !ts.isCatchClause(node.parent)) {
        const init = node.initializer;
        if (init && (ts.isArrowFunction(init) || ts.isFunctionExpression(init))) {
          enterFunction(node.name.text, init, init.body);
          return;
        }
        outline.assignments.push(node.name.text);
      }

      if (ts.isFunctionDeclaration(node) || ts.isMethodDeclaration(node) || ts.isFunctionExpression(node)) {
        const name = node.name && (ts.isIdentifier(node.name) || ts.isPrivateIdentifier(node.name))
          ? node.name.text
          : undefined;
        if (name) {
          enterFunction(name, node, node.body);
          return;
        }
      }

      if ((ts.isClassDeclaration(node) || ts.isClassExpression(node)) && node.name) {
        outline.classes.push(node.name.text);
      }

      if (ts.isTryStatement(node)) {
        outline.errorHandling.tryBlocks++;
        visit(node.tryBlock, inCatch);
        if (node.catchClause) {
          visit(node.catchClause, true);
        }
        if (node.finallyBlock) {
          visit(node.finallyBlock, inCatch);
        }
        return;
      }

      if (
        inCatch &&
        ts.isBinaryExpression(node) &&
        node.operatorToken.kind === ts.SyntaxKind.InstanceOfKeyword
      ) {
        const right = node.right;
        if (ts.isIdentifier(right)) {
          outline.errorHandling.handledTypes.push(right.text);
        } else if (ts.isPropertyAccessExpression(right)) {
          outline.errorHandling.handledTypes.push(right.name.text);
        }
      }

      if (ts.isCallExpression(node)) {
        this.recordImportCall(node, outline);
        const call = this.callSite(node);
        if (call) {
          recordCall(call);
        }
      }

      ts.forEachChild(node, child => visit(child, inCatch));
    };

    ts.forEachChild(sourceFile, child => visit(child, false));
    return outline;
  }

  private checkSyntax(content: string, filePath: string): void {
    const result = ts.transpileModule(content, {
      fileName: filePath,
      reportDiagnostics: true,
      compilerOptions: { allowJs: true, jsx: ts.JsxEmit.Preserve },
    });
    const errors = (result.diagnostics ?? []).filter(d => d.category === ts.DiagnosticCategory.Error);
    const first = errors[0];
    if (first) {
      const where = first.file && first.start !== undefined
        ? `:${first.file.getLineAndCharacterOfPosition(first.start).line + 1}`
        : '';
      throw new SourceParseError(
        `${filePath}${where}: ${ts.flattenDiagnosticMessageText(first.messageText, '\n')}`,
        filePath
      );
    }
  }

  /** `require('x')` and `import('x')` */
  private recordImportCall(node: ts.CallExpression, outline: SourceOutline): void {
    const arg = node.arguments[0];
    if (!arg || !ts.isStringLiteral(arg)) {
      return;
    }
    const isRequire = ts.isIdentifier(node.expression) && node.expression.text === 'require';
    const isDynamicImport = node.expression.kind === ts.SyntaxKind.ImportKeyword;
    if (isRequire || isDynamicImport) {
      outline.imports.push({ category: 'js_imports', module: arg.text });
    }
  }

  private callSite(node: ts.CallExpression): CallSite | null {
    const callee = node.expression;
    if (ts.isIdentifier(callee)) {
      return { name: callee.text };
    }
    if (ts.isPropertyAccessExpression(callee)) {
      const receiver = callee.expression;
      let object: string | undefined;
      if (ts.isIdentifier(receiver)) {
        object = receiver.text;
      } else if (receiver.kind === ts.SyntaxKind.ThisKeyword) {
        object = 'this';
      } else if (ts.isPropertyAccessExpression(receiver)) {
        object = receiver.name.text;
      }
      return object === undefined ? { name: callee.name.text } : { object, name: callee.name.text };
    }
    return null;
  }
}
