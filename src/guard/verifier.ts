/**
 * Patch guard - deterministic verification of a single file transformation.
 * TypeScript and JavaScript go through the compiler API, Python through Lezer.
 *
 * Layers, in order:
 * 1. Parse check: the new content has no syntax errors
 * 2. AST equivalence (strict only): old and new content have the same tree
 * 3. Round-trip: re-serializing the parsed tree reproduces the new content
 *
 * The first failing layer decides the result; a result never partially passes.
 */

import fs from 'node:fs';
import type { CheckResult, GuardResult, GuardType } from '../types/schemas.js';
import { errorMessage } from '../errors.js';
import { DEFAULT_FILE_NAME, isGuardedFile, syntaxBackendFor } from './syntax.js';

const MAX_REPORTED_DIAGNOSTICS = 5;

export function verifyParse(source: string, fileName: string = DEFAULT_FILE_NAME): CheckResult {
  let diagnostics: string[];
  try {
    diagnostics = syntaxBackendFor(fileName).diagnostics(source);
  } catch (err) {
    return { ok: false, errors: [`Parser error: ${errorMessage(err)}`] };
  }
  if (diagnostics.length === 0) {
    return { ok: true, errors: [] };
  }
  const errors = diagnostics.slice(0, MAX_REPORTED_DIAGNOSTICS).map((d) => `SyntaxError: ${d}`);
  if (diagnostics.length > MAX_REPORTED_DIAGNOSTICS) {
    errors.push(`(+${diagnostics.length - MAX_REPORTED_DIAGNOSTICS} more)`);
  }
  return { ok: false, errors };
}

/**
 * Semantic check: both sources must parse to the same tree, ignoring
 * formatting, comments and quote style.
 */
export function verifyAstEquivalence(
  before: string,
  after: string,
  fileName: string = DEFAULT_FILE_NAME
): CheckResult {
  for (const [label, source] of [['before', before], ['after', after]] as const) {
    const parsed = verifyParse(source, fileName);
    if (!parsed.ok) {
      return {
        ok: false,
        errors: [`Parse error during AST comparison (${label}): ${parsed.errors[0] ?? 'unknown'}`]
      };
    }
  }

  const backend = syntaxBackendFor(fileName);
  if (backend.structure(before) !== backend.structure(after)) {
    return { ok: false, errors: ['AST structures differ (semantic change detected)'] };
  }
  return { ok: true, errors: [] };
}

/**
 * Lossless-toolchain check: tree → text must reproduce the source byte
 * for byte, and the reproduced text must parse to the same tree.
 */
export function verifyCstRoundtrip(source: string, fileName: string = DEFAULT_FILE_NAME): CheckResult {
  try {
    const backend = syntaxBackendFor(fileName);
    const printed = backend.reprint(source);
    if (printed !== source) {
      return { ok: false, errors: ['Round-trip produced different source text'] };
    }
    if (backend.structure(printed) !== backend.structure(source)) {
      return { ok: false, errors: ['Round-trip produced different tree'] };
    }
  } catch (err) {
    return { ok: false, errors: [`Round-trip error: ${errorMessage(err)}`] };
  }
  return { ok: true, errors: [] };
}

function result(
  file: string,
  before: string,
  after: string,
  guardType: GuardType,
  errors: readonly string[] = []
): GuardResult {
  return {
    passed: guardType === 'all' || guardType === 'unguarded',
    file,
    before_content: before,
    after_content: after,
    guard_type: guardType,
    errors: [...errors]
  };
}

/**
 * Guard a source edit with every verification layer.
 *
 * @param strict - also require AST equivalence between before and after
 */
export function guardEdit(filePath: string, before: string, after: string, strict = false): GuardResult {
  const parsed = verifyParse(after, filePath);
  if (!parsed.ok) {
    return result(filePath, before, after, 'parse', parsed.errors);
  }

  if (strict) {
    const equivalent = verifyAstEquivalence(before, after, filePath);
    if (!equivalent.ok) {
      return result(filePath, before, after, 'ast_equiv', equivalent.errors);
    }
  }

  const roundtrip = verifyCstRoundtrip(after, filePath);
  if (!roundtrip.ok) {
    return result(filePath, before, after, 'cst_apply', roundtrip.errors);
  }

  return result(filePath, before, after, 'all');
}

/**
 * Guard an edit against the file's current content on disk.
 * Files outside the guarded languages pass through as `unguarded`.
 */
export function guardFileEdit(filePath: string, after: string, strict = false): GuardResult {
  let before: string;
  try {
    before = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    return result(filePath, '', after, 'read', [`Failed to read original file: ${errorMessage(err)}`]);
  }

  if (!isGuardedFile(filePath)) {
    return result(filePath, before, after, 'unguarded');
  }
  return guardEdit(filePath, before, after, strict);
}

/** Signature the repair engine uses as its oracle. */
export type GuardFn = (filePath: string, before: string, after: string) => GuardResult;

/** Guard function for any path: guarded languages are checked, others pass through. */
export function guardFor(strict: boolean): GuardFn {
  return (filePath, before, after) =>
    isGuardedFile(filePath) ? guardEdit(filePath, before, after, strict) : result(filePath, before, after, 'unguarded');
}

/** Failing result for edits that could not be applied at all. */
export function applyFailure(filePath: string, before: string, message: string): GuardResult {
  return result(filePath, before, before, 'cst_apply', [message]);
}

export function formatGuardError(guardResult: GuardResult): string {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    'PATCH GUARD FAILED',
    rule,
    `File: ${guardResult.file}`,
    `Guard Type: ${guardResult.guard_type}`,
    '',
    'Errors:',
    ...guardResult.errors.map((e) => `  - ${e}`),
    '',
    'Action: Edit aborted, file left untouched',
    rule
  ];
  return lines.join('\n');
}

export interface GuardSummary {
  total: number;
  passed: number;
  failed: number;
  pass_rate: number;
  failures_by_type: Partial<Record<GuardType, number>>;
}

export function getGuardSummary(results: readonly GuardResult[]): GuardSummary {
  const failuresByType: Partial<Record<GuardType, number>> = {};
  let passed = 0;
  for (const r of results) {
    if (r.passed) {
      passed += 1;
    } else {
      failuresByType[r.guard_type] = (failuresByType[r.guard_type] ?? 0) + 1;
    }
  }
  return {
    total: results.length,
    passed,
    failed: results.length - passed,
    pass_rate: results.length > 0 ? passed / results.length : 0,
    failures_by_type: failuresByType
  };
}
