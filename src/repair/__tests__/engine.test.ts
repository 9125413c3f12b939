import { describe, it, expect } from 'vitest';
import type { Edit, GuardResult } from '../../types/schemas.js';
import { guardFor, type GuardFn } from '../../guard/verifier.js';
import { tryApplyWithRepair } from '../engine.js';

function replace(file: string, line: number, payload: string): Edit {
  return { file, op: 'replace', start_line: line, end_line: line, payload };
}

function passIf(predicate: (after: string) => boolean): GuardFn {
  return (file, before, after): GuardResult => ({
    passed: predicate(after),
    file,
    before_content: before,
    after_content: after,
    guard_type: predicate(after) ? 'all' : 'parse',
    errors: predicate(after) ? [] : ['rejected by test guard']
  });
}

const FIVE_LINES = ['const a0 = 0;', 'const a1 = 1;', 'const a2 = 2;', 'const a3 = 3;', 'const a4 = 4;', ''].join('\n');

// Submitted out of order; edits 1 and 3 (sorted) break parsing
const MIXED_EDITS: Edit[] = [
  replace('five.ts', 5, 'const b4 = 4;'),
  replace('five.ts', 2, 'const b1 = ;'),
  replace('five.ts', 1, 'const b0 = 0;'),
  replace('five.ts', 4, 'const b3 = ;'),
  replace('five.ts', 3, 'const b2 = 2;')
];

describe('tryApplyWithRepair', () => {
  it('applies everything without a report when the guard passes', () => {
    const result = tryApplyWithRepair('five.ts', [replace('five.ts', 1, 'const z = 0;')], FIVE_LINES, guardFor(false), 'r1');
    expect(result.success).toBe(true);
    expect(result.partial_apply).toBe(false);
    expect(result.report).toBeUndefined();
    expect(result.guard_calls).toBe(1);
    expect(result.content.startsWith('const z = 0;\nconst a1 = 1;\n')).toBe(true);
  });

  it('isolates the two breaking edits out of five', () => {
    const result = tryApplyWithRepair('five.ts', MIXED_EDITS, FIVE_LINES, guardFor(false), 'run-1');

    expect(result.success).toBe(true);
    expect(result.partial_apply).toBe(true);
    expect(result.content).toBe(
      ['const b0 = 0;', 'const a1 = 1;', 'const b2 = 2;', 'const a3 = 3;', 'const b4 = 4;', ''].join('\n')
    );
    expect(result.guard_calls).toBe(9);

    const report = result.report;
    expect(report).toBeDefined();
    expect(report?.run_id).toBe('run-1');
    expect(report?.file).toBe('five.ts');
    expect(report?.total_edits).toBe(5);
    expect(report?.safe_edits).toBe(3);
    expect(report?.failed_edits).toBe(2);
    expect(report?.safe_edit_indices).toEqual([0, 2, 4]);
    expect(report?.failed_edit_indices).toEqual([1, 3]);
    expect(report?.guard_failure_reason.startsWith('parse: SyntaxError: ')).toBe(true);
    expect(report?.repair_suggestions).toEqual([
      'Syntax error introduced by edit',
      'Review the transformation logic for parse correctness',
      'Edits [1, 3] failed guard checks',
      'Manual review recommended before re-attempting'
    ]);
  });

  it('produces identical indices on repeated runs', () => {
    const runs = [0, 1, 2].map(() => tryApplyWithRepair('five.ts', MIXED_EDITS, FIVE_LINES, guardFor(false), 'run-1'));
    const fingerprints = runs.map((r) => ({
      content: r.content,
      safe: r.report?.safe_edit_indices,
      failed: r.report?.failed_edit_indices,
      reason: r.report?.guard_failure_reason
    }));
    expect(fingerprints[1]).toEqual(fingerprints[0]);
    expect(fingerprints[2]).toEqual(fingerprints[0]);
  });

  it('does not depend on submission order', () => {
    const forward = tryApplyWithRepair('five.ts', MIXED_EDITS, FIVE_LINES, guardFor(false));
    const reversed = tryApplyWithRepair('five.ts', [...MIXED_EDITS].reverse(), FIVE_LINES, guardFor(false));
    expect(reversed.report?.failed_edit_indices).toEqual(forward.report?.failed_edit_indices);
    expect(reversed.content).toBe(forward.content);
  });

  it('keeps an earlier edit that a later one depends on', () => {
    const original = 'l1\nl2\nl3\nl4\nl5\n';
    const edits = [replace('f.txt', 5, 'USE'), replace('f.txt', 3, 'BAD'), replace('f.txt', 1, 'DEF')];
    const guard = passIf((after) => !after.includes('BAD') && (!after.includes('USE') || after.includes('DEF')));

    const result = tryApplyWithRepair('f.txt', edits, original, guard);
    expect(result.report?.safe_edit_indices).toEqual([0, 2]);
    expect(result.report?.failed_edit_indices).toEqual([1]);
    expect(result.content).toBe('DEF\nl2\nl3\nl4\nUSE\n');
  });

  it('leaves the original untouched when no edit is safe', () => {
    const original = 'x\ny\n';
    const result = tryApplyWithRepair(
      'f.txt',
      [replace('f.txt', 1, 'BAD1'), replace('f.txt', 2, 'BAD2')],
      original,
      passIf((after) => !after.includes('BAD')),
      'r9'
    );
    expect(result.success).toBe(false);
    expect(result.partial_apply).toBe(false);
    expect(result.content).toBe(original);
    expect(result.report?.safe_edits).toBe(0);
    expect(result.report?.failed_edits).toBe(2);
    expect(result.report?.failed_edit_indices).toEqual([0, 1]);
    expect(result.report?.guard_failure_reason).toBe('parse: rejected by test guard');
  });

  it('fails a single bad edit without bisecting', () => {
    const result = tryApplyWithRepair('f.txt', [replace('f.txt', 1, 'BAD')], 'x\n', passIf((a) => !a.includes('BAD')));
    expect(result.success).toBe(false);
    expect(result.guard_calls).toBe(1);
    expect(result.report?.failed_edit_indices).toEqual([0]);
  });

  it('treats conflicting edits as a cst_apply failure', () => {
    const edits = [replace('notes.txt', 2, 'first'), replace('notes.txt', 2, 'second')];
    const result = tryApplyWithRepair('notes.txt', edits, 'a\nb\nc\n', guardFor(false));
    expect(result.success).toBe(true);
    expect(result.partial_apply).toBe(true);
    expect(result.content).toBe('a\nfirst\nc\n');
    expect(result.report?.failed_edit_indices).toEqual([1]);
    expect(result.report?.guard_failure_reason).toBe('cst_apply: Edit replace 2-2 overlaps a previous edit in notes.txt');
  });

  it('succeeds trivially with no edits', () => {
    const result = tryApplyWithRepair('f.ts', [], 'x', guardFor(false));
    expect(result).toEqual({ success: true, partial_apply: false, content: 'x', guard_calls: 0 });
  });
});
