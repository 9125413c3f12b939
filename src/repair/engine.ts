/**
 * Repair engine - isolates failing edits and salvages the safe subset.
 *
 * When a file's edits fail the guard as a whole, a left-to-right bisection
 * finds every edit that breaks the guard on its own or in combination with
 * edits already accepted, and keeps the rest. Edits are always sequenced by
 * (start_line, end_line), so the same inputs yield the same indices on
 * every run.
 */

import type { Edit, GuardResult, RepairReport } from '../types/schemas.js';
import { EditConflictError } from '../errors.js';
import { applyFailure, type GuardFn } from '../guard/verifier.js';
import { isoTimestamp } from '../store/run-id.js';
import { applyEdits, sortEdits } from './apply-edits.js';

export interface TryApplyResult {
  success: boolean;
  /** True when at least one edit was kept but not all of them. */
  partial_apply: boolean;
  /** Final content: original with the safe edits applied. */
  content: string;
  report?: RepairReport;
  /** Number of guard invocations spent, including the initial full attempt. */
  guard_calls: number;
}

interface Range {
  lo: number;
  hi: number;
}

/**
 * Try to apply edits, falling back to bisection repair if the guard fails.
 *
 * 1. Apply all edits; if the guard passes, done (no report).
 * 2. Otherwise split [0, n) in halves. Each range is applied on top of the
 *    edits accepted so far: a passing range is accepted, a failing range of
 *    one edit is discarded, a failing larger range is split again. Ranges
 *    are visited left to right via an explicit work stack.
 * 3. Report safe and failed indices (positions in sorted order).
 */
export function tryApplyWithRepair(
  filePath: string,
  edits: readonly Edit[],
  originalContent: string,
  guardFn: GuardFn,
  runId = ''
): TryApplyResult {
  if (edits.length === 0) {
    return { success: true, partial_apply: false, content: originalContent, guard_calls: 0 };
  }

  const sorted = sortEdits(edits);
  let guardCalls = 0;

  const check = (indices: readonly number[]): { result: GuardResult; content: string } => {
    guardCalls += 1;
    let content: string;
    try {
      content = applyEdits(originalContent, indices.map((i) => sorted[i]));
    } catch (err) {
      if (err instanceof EditConflictError) {
        return { result: applyFailure(filePath, originalContent, err.message), content: originalContent };
      }
      throw err;
    }
    return { result: guardFn(filePath, originalContent, content), content };
  };

  const all = sorted.map((_, i) => i);
  const full = check(all);
  if (full.result.passed) {
    return { success: true, partial_apply: false, content: full.content, guard_calls: guardCalls };
  }

  const accepted: number[] = [];
  const failed: number[] = [];
  let current = originalContent;

  // LIFO: push right half first so the left half is visited first
  const stack: Range[] = [];
  const split = ({ lo, hi }: Range): void => {
    const mid = lo + Math.floor((hi - lo) / 2);
    stack.push({ lo: mid, hi }, { lo, hi: mid });
  };

  if (sorted.length === 1) {
    failed.push(0);
  } else {
    split({ lo: 0, hi: sorted.length });
  }

  while (stack.length > 0) {
    const range = stack.pop();
    if (!range || range.hi <= range.lo) {
      continue;
    }
    const candidate = [...accepted];
    for (let i = range.lo; i < range.hi; i++) {
      candidate.push(i);
    }
    const attempt = check(candidate);
    if (attempt.result.passed) {
      accepted.push(...candidate.slice(accepted.length));
      current = attempt.content;
    } else if (range.hi - range.lo === 1) {
      failed.push(range.lo);
    } else {
      split(range);
    }
  }

  const reason = formatGuardFailure(full.result);
  const timestamp = isoTimestamp();

  if (accepted.length === 0) {
    return {
      success: false,
      partial_apply: false,
      content: originalContent,
      guard_calls: guardCalls,
      report: {
        run_id: runId,
        file: filePath,
        total_edits: sorted.length,
        safe_edits: 0,
        failed_edits: sorted.length,
        safe_edit_indices: [],
        failed_edit_indices: [...failed],
        guard_failure_reason: reason,
        repair_suggestions: [
          'All edits failed guard checks',
          'Review the rule logic or file structure',
          'Consider filing a bug report if this seems incorrect'
        ],
        timestamp
      }
    };
  }

  return {
    success: true,
    partial_apply: failed.length > 0,
    content: current,
    guard_calls: guardCalls,
    report: {
      run_id: runId,
      file: filePath,
      total_edits: sorted.length,
      safe_edits: accepted.length,
      failed_edits: failed.length,
      safe_edit_indices: [...accepted],
      failed_edit_indices: [...failed],
      guard_failure_reason: reason,
      repair_suggestions: generateRepairSuggestions(failed, full.result),
      timestamp
    }
  };
}

export function formatGuardFailure(guardResult: GuardResult): string {
  if (guardResult.errors.length === 0) {
    return `Guard failed: ${guardResult.guard_type}`;
  }
  return `${guardResult.guard_type}: ${guardResult.errors.slice(0, 3).join('; ')}`;
}

function generateRepairSuggestions(failedIndices: readonly number[], guardResult: GuardResult): string[] {
  const suggestions: string[] = [];

  switch (guardResult.guard_type) {
    case 'parse':
      suggestions.push('Syntax error introduced by edit');
      suggestions.push('Review the transformation logic for parse correctness');
      break;
    case 'ast_equiv':
      suggestions.push('Semantic change detected (AST mismatch)');
      suggestions.push('Edit may have unintended side effects');
      break;
    case 'cst_apply':
      suggestions.push('Edits could not be applied or did not round-trip cleanly');
      suggestions.push('Check for overlapping or out-of-range line ranges');
      break;
    default:
      break;
  }

  if (failedIndices.length === 1) {
    suggestions.push(`Only edit #${failedIndices[0]} failed`);
  } else {
    suggestions.push(`Edits [${failedIndices.join(', ')}] failed guard checks`);
  }
  suggestions.push('Manual review recommended before re-attempting');
  return suggestions;
}
