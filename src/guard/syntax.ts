/**
 * Syntax-tree helpers over the TypeScript compiler API, and the per-language
 * backend the guard dispatches through.
 */

import path from 'node:path';
import ts from 'typescript';
import { PYTHON_EXTENSIONS, isPythonFile, printPythonFromTree, pythonDiagnostics, pythonStructure } from './python.js';

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  '.ts': ts.ScriptKind.TS,
  '.mts': ts.ScriptKind.TS,
  '.cts': ts.ScriptKind.TS,
  '.tsx': ts.ScriptKind.TSX,
  '.js': ts.ScriptKind.JS,
  '.mjs': ts.ScriptKind.JS,
  '.cjs': ts.ScriptKind.JS,
  '.jsx': ts.ScriptKind.JSX
};

export const GUARDED_EXTENSIONS: readonly string[] = [...Object.keys(SCRIPT_KINDS), ...PYTHON_EXTENSIONS];

export const DEFAULT_FILE_NAME = 'module.ts';

export function isGuardedFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() in SCRIPT_KINDS || isPythonFile(filePath);
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  return SCRIPT_KINDS[path.extname(fileName).toLowerCase()] ?? ts.ScriptKind.TS;
}

export function parseSource(source: string, fileName: string = DEFAULT_FILE_NAME): ts.SourceFile {
  return ts.createSourceFile(
    path.basename(fileName),
    source,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(fileName)
  );
}

/**
 * Syntactic diagnostics only; nothing is type-checked or executed.
 * Messages are formatted as "line:col message".
 */
export function syntaxDiagnostics(source: string, fileName: string = DEFAULT_FILE_NAME): string[] {
  const output = ts.transpileModule(source, {
    fileName: path.basename(fileName),
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      allowJs: true
    }
  });

  return (output.diagnostics ?? []).map((diagnostic) => {
    const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
    if (diagnostic.file && diagnostic.start !== undefined) {
      const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
      return `${line + 1}:${character + 1} ${message}`;
    }
    return message;
  });
}

/**
 * Position-free structural dump of a syntax tree.
 *
 * Trivia (whitespace, comments) never appears. Literals contribute their
 * cooked value, so 'a' and "a" dump identically.
 */
export function structureOf(node: ts.Node): string {
  const parts: string[] = [ts.SyntaxKind[node.kind]];

  const blockScope = node.flags & ts.NodeFlags.BlockScoped;
  if (blockScope) {
    parts.push(`flags=${blockScope}`);
  }

  const value = leafValue(node);
  if (value !== undefined) {
    parts.push(JSON.stringify(value));
  }

  const operator = operatorOf(node);
  if (operator !== undefined) {
    parts.push(ts.SyntaxKind[operator]);
  }

  if (isTypeOnlyNode(node) && node.isTypeOnly) {
    parts.push('typeOnly');
  }

  ts.forEachChild(node, (child) => {
    parts.push(structureOf(child));
  });

  return `(${parts.join(' ')})`;
}

function leafValue(node: ts.Node): string | undefined {
  if (
    ts.isIdentifier(node) ||
    ts.isPrivateIdentifier(node) ||
    ts.isStringLiteral(node) ||
    ts.isNumericLiteral(node) ||
    ts.isBigIntLiteral(node) ||
    ts.isRegularExpressionLiteral(node) ||
    ts.isNoSubstitutionTemplateLiteral(node) ||
    ts.isTemplateHead(node) ||
    ts.isTemplateMiddle(node) ||
    ts.isTemplateTail(node) ||
    ts.isJsxText(node)
  ) {
    return node.text;
  }
  return undefined;
}

// Operators stored as plain fields rather than child nodes
function operatorOf(node: ts.Node): ts.SyntaxKind | undefined {
  if (ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node)) {
    return node.operator;
  }
  if (ts.isTypeOperatorNode(node)) {
    return node.operator;
  }
  if (ts.isHeritageClause(node)) {
    return node.token;
  }
  if (ts.isMetaProperty(node)) {
    return node.keywordToken;
  }
  return undefined;
}

function isTypeOnlyNode(
  node: ts.Node
): node is ts.ImportClause | ts.ImportSpecifier | ts.ExportSpecifier | ts.ExportDeclaration | ts.ImportEqualsDeclaration {
  return (
    ts.isImportClause(node) ||
    ts.isImportSpecifier(node) ||
    ts.isExportSpecifier(node) ||
    ts.isExportDeclaration(node) ||
    ts.isImportEqualsDeclaration(node)
  );
}

/**
 * Re-serialize a parsed tree from its tokens: each leaf token contributes
 * its full text (leading trivia included), in tree order. JSDoc nodes are
 * skipped because their text is already part of the next token's trivia.
 */
export function printFromTokens(sourceFile: ts.SourceFile): string {
  const chunks: string[] = [];

  const visit = (node: ts.Node): void => {
    // The end-of-file token reports a trailing JSDoc as its only child
    const children = node.getChildren(sourceFile).filter((child) => child.kind !== ts.SyntaxKind.JSDoc);
    if (children.length === 0) {
      chunks.push(node.getFullText(sourceFile));
      return;
    }
    for (const child of children) {
      visit(child);
    }
  };

  visit(sourceFile);
  return chunks.join('');
}

/** What the guard needs from a language: errors, a comparable tree, a reprint. */
export interface SyntaxBackend {
  /** "line:col message" per syntax error. */
  diagnostics(source: string): string[];
  /** Position-free dump; equal dumps mean equivalent sources. */
  structure(source: string): string;
  /** Source text rebuilt from the parsed tree. */
  reprint(source: string): string;
}

const pythonBackend: SyntaxBackend = {
  diagnostics: pythonDiagnostics,
  structure: pythonStructure,
  reprint: printPythonFromTree
};

function typescriptBackend(fileName: string): SyntaxBackend {
  return {
    diagnostics: (source) => syntaxDiagnostics(source, fileName),
    structure: (source) => structureOf(parseSource(source, fileName)),
    reprint: (source) => printFromTokens(parseSource(source, fileName))
  };
}

/** Python for .py/.pyi, the TypeScript compiler for everything else. */
export function syntaxBackendFor(fileName: string = DEFAULT_FILE_NAME): SyntaxBackend {
  return isPythonFile(fileName) ? pythonBackend : typescriptBackend(fileName);
}
