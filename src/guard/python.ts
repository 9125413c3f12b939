/**
 * Python syntax helpers over the Lezer Python grammar.
 *
 * Lezer trees are lossless: every node carries its source span and the
 * parser recovers from errors by inserting error nodes instead of throwing.
 */

import path from 'node:path';
import type { SyntaxNode } from '@lezer/common';
import { parser } from '@lezer/python';

export const PYTHON_EXTENSIONS: readonly string[] = ['.py', '.pyi'];

const STRING_LITERAL = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

export function isPythonFile(fileName: string): boolean {
  return PYTHON_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

function parsePython(source: string): SyntaxNode {
  return parser.parse(source).topNode;
}

function children(node: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    result.push(child);
  }
  return result;
}

function position(source: string, offset: number): string {
  const before = source.slice(0, offset);
  const line = before.split('\n').length;
  const column = offset - (before.lastIndexOf('\n') + 1) + 1;
  return `${line}:${column}`;
}

/** One "line:col invalid syntax" message per error node, in source order. */
export function pythonDiagnostics(source: string): string[] {
  const errors: string[] = [];
  const visit = (node: SyntaxNode): void => {
    if (node.type.isError) {
      errors.push(`${position(source, node.from)} invalid syntax`);
    }
    children(node).forEach(visit);
  };
  visit(parsePython(source));
  return errors;
}

// 'a', "a" and R"a" all normalize to the lowercased prefix plus the body
function normalizeString(text: string): string {
  const match = STRING_LITERAL.exec(text);
  if (!match) {
    return text;
  }
  const [, prefix = '', , body = ''] = match;
  return `${prefix.toLowerCase()}:${body}`;
}

// Text between named nodes holds anonymous tokens; whitespace there is layout
function normalizeGap(gap: string, inString: boolean): string {
  return inString ? gap : gap.replace(/\\\r?\n/g, '').replace(/\s+/g, '');
}

function structureOfNode(node: SyntaxNode, source: string): string {
  const name = node.type.name;
  if (name === 'String') {
    return `(String ${JSON.stringify(normalizeString(source.slice(node.from, node.to)))})`;
  }

  const inString = name.includes('String');
  const parts: string[] = [name];
  const pushGap = (from: number, to: number): void => {
    const gap = normalizeGap(source.slice(from, to), inString);
    if (gap !== '') {
      parts.push(JSON.stringify(gap));
    }
  };

  let pos = node.from;
  for (const child of children(node)) {
    pushGap(pos, child.from);
    if (child.type.name !== 'Comment') {
      parts.push(structureOfNode(child, source));
    }
    pos = Math.max(pos, child.to);
  }
  pushGap(pos, node.to);

  return `(${parts.join(' ')})`;
}

/**
 * Position-free structural dump of a Python module.
 *
 * Comments and layout whitespace never appear; string literals contribute
 * their body with a normalized prefix, so 'a' and "a" dump identically.
 */
export function pythonStructure(source: string): string {
  return structureOfNode(parsePython(source), source);
}

/**
 * Re-serialize a parsed module from its tree: every node contributes the
 * text between its children plus its children's own text, in tree order.
 */
export function printPythonFromTree(source: string): string {
  const print = (node: SyntaxNode): string => {
    const chunks: string[] = [];
    let pos = node.from;
    for (const child of children(node)) {
      chunks.push(source.slice(pos, child.from), print(child));
      pos = Math.max(pos, child.to);
    }
    chunks.push(source.slice(pos, node.to));
    return chunks.join('');
  };
  return print(parsePython(source));
}
