/**
 * Change budget - caps how many files and lines one run may modify.
 *
 * Plans are taken in (R* desc, path asc) order until the next plan would
 * push the touched-file set or the modified-line total past its limit.
 * A plan that does not fit is skipped; smaller plans after it may still fit.
 */

import type { EditPlan } from '../types/schemas.js';
import { computePlanRstar } from './engine.js';

export interface BudgetConstraints {
  maxFiles?: number;
  maxLines?: number;
}

export interface BudgetSummary {
  included_count: number;
  excluded_count: number;
  included_files: string[];
  excluded_files: string[];
  total_lines_modified: number;
  skipped_lines: number;
}

export interface BudgetResult {
  included: EditPlan[];
  excluded: EditPlan[];
  summary: BudgetSummary;
}

/** Lines a plan touches: replaced or deleted ranges, plus inserted payload lines. */
export function countLinesInPlan(plan: Pick<EditPlan, 'edits'>): number {
  let total = 0;
  for (const edit of plan.edits) {
    if (edit.op === 'insert') {
      total += edit.payload.split('\n').length;
    } else {
      total += edit.end_line - edit.start_line + 1;
    }
  }
  return total;
}

function sortKeyPath(plan: EditPlan): string {
  return plan.findings[0]?.file ?? plan.edits[0]?.file ?? '';
}

export function applyBudget(plans: readonly EditPlan[], constraints: BudgetConstraints = {}): BudgetResult {
  const scored = plans.map((plan) => ({ plan, score: computePlanRstar(plan), key: sortKeyPath(plan) }));
  scored.sort((a, b) => b.score - a.score || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  const included: EditPlan[] = [];
  const excluded: EditPlan[] = [];
  const filesSeen = new Set<string>();
  const excludedFiles = new Set<string>();
  let totalLines = 0;
  let skippedLines = 0;

  for (const { plan } of scored) {
    const lines = countLinesInPlan(plan);
    const planFiles = plan.edits.map((e) => e.file);
    const union = new Set([...filesSeen, ...planFiles]);

    const overFiles = constraints.maxFiles !== undefined && union.size > constraints.maxFiles;
    const overLines = constraints.maxLines !== undefined && totalLines + lines > constraints.maxLines;

    if (overFiles || overLines) {
      excluded.push(plan);
      planFiles.forEach((file) => excludedFiles.add(file));
      skippedLines += lines;
    } else {
      included.push(plan);
      planFiles.forEach((file) => filesSeen.add(file));
      totalLines += lines;
    }
  }

  return {
    included,
    excluded,
    summary: {
      included_count: included.length,
      excluded_count: excluded.length,
      included_files: [...filesSeen].sort(),
      excluded_files: [...excludedFiles].sort(),
      total_lines_modified: totalLines,
      skipped_lines: skippedLines
    }
  };
}

export function formatBudgetSummary(summary: BudgetSummary): string {
  const lines = [
    'Budget Summary:',
    `  Included: ${summary.included_count} plans (${summary.included_files.length} files, ${summary.total_lines_modified} lines)`
  ];
  if (summary.excluded_count > 0) {
    lines.push(
      `  Excluded: ${summary.excluded_count} plans (${summary.excluded_files.length} files, ${summary.skipped_lines} lines) - budget limit reached`
    );
  }
  return lines.join('\n');
}

/** Excluded plans grouped by file, one line per file. */
export function formatExcludedSummary(excluded: readonly EditPlan[]): string {
  if (excluded.length === 0) {
    return 'No plans excluded.';
  }
  const byFile = new Map<string, string[]>();
  for (const plan of excluded) {
    for (const edit of plan.edits) {
      const ids = byFile.get(edit.file) ?? [];
      ids.push(plan.id);
      byFile.set(edit.file, ids);
    }
  }
  const lines = [`${excluded.length} plans excluded due to budget constraints:`];
  for (const file of [...byFile.keys()].sort()) {
    lines.push(`  ${file}: ${byFile.get(file)?.length ?? 0} plan(s)`);
  }
  return lines.join('\n');
}
