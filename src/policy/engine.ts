/**
 * Policy engine - turns a plan into auto / suggest / deny.
 *
 * R* = alpha * value + beta * impact, compared against thresholds the
 * learning engine has tuned for the plan's rules. Suppressions, rule modes
 * and learned skip heuristics can only make a decision more cautious.
 */

import type { EditPlan, PolicyDecisionKind, PolicyThresholds, Severity } from '../types/schemas.js';
import { DEFAULT_ALPHA, DEFAULT_BETA, defaultConfig, type PolicyConfig } from '../config/schema.js';
import { contextKey, getRuleIdsFromPlan, type LearningEngine } from '../learning/engine.js';
import { getMode, isSuppressed } from './config.js';

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  critical: 1.0,
  high: 0.75,
  medium: 0.5,
  low: 0.25,
  info: 0.1
};

/** Edits at which a plan counts as maximally complex. */
const FULL_IMPACT_EDITS = 10;

export interface PolicyDecision {
  decision: PolicyDecisionKind;
  score: number;
  thresholds: PolicyThresholds;
  rule_ids: string[];
  context_key: string;
  /** Why the decision came out the way it did, in evaluation order. */
  reasons: string[];
}

export interface PolicyContext {
  learning?: LearningEngine;
  policy?: PolicyConfig;
  /** Revert rate above which a known context is only suggested. */
  skipContextThreshold?: number;
}

export function rstar(value: number, impact: number, alpha = DEFAULT_ALPHA, beta = DEFAULT_BETA): number {
  return alpha * value + beta * impact;
}

export function decision(score: number, thresholds: PolicyThresholds): PolicyDecisionKind {
  if (score >= thresholds.auto) {
    return 'auto';
  }
  if (score >= thresholds.suggest) {
    return 'suggest';
  }
  return 'deny';
}

/**
 * Score a plan: value is its most severe finding's weight, impact grows
 * with the number of edits and saturates at ten. No findings scores 0.
 */
export function computePlanRstar(
  plan: Pick<EditPlan, 'findings' | 'edits'>,
  weights: { alpha?: number; beta?: number } = {}
): number {
  if (plan.findings.length === 0) {
    return 0;
  }
  const value = Math.max(...plan.findings.map((f) => SEVERITY_WEIGHTS[f.severity]));
  const impact = Math.min(1, plan.edits.length / FULL_IMPACT_EDITS);
  return rstar(value, impact, weights.alpha, weights.beta);
}

/** Files a plan touches or reports on, sorted. */
function planFiles(plan: EditPlan): string[] {
  return [...new Set([...plan.edits.map((e) => e.file), ...plan.findings.map((f) => f.file)])].sort();
}

/**
 * Single entry point combining scoring and decision.
 *
 * Thresholds are the most conservative tuned pair across the plan's rules,
 * falling back to the policy's configured ones when nothing is learned.
 */
export function enforcePolicy(plan: EditPlan, context: PolicyContext = {}): PolicyDecision {
  const policy = context.policy ?? defaultConfig().policy;
  const { learning } = context;
  const ruleIds = getRuleIdsFromPlan(plan);
  const key = contextKey(plan);

  const score = computePlanRstar(plan, { alpha: policy.alpha, beta: policy.beta });

  const thresholds: PolicyThresholds = { auto: policy.auto_threshold, suggest: policy.suggest_threshold };
  if (learning && ruleIds.length > 0) {
    const tuned = ruleIds.map((ruleId) => learning.tunedThresholds(ruleId));
    thresholds.auto = Math.max(...tuned.map((t) => t.auto));
    thresholds.suggest = Math.max(...tuned.map((t) => t.suggest));
  }

  let kind = decision(score, thresholds);
  const reasons = [
    `R*=${score.toFixed(3)} (auto >= ${thresholds.auto.toFixed(2)}, suggest >= ${thresholds.suggest.toFixed(2)}): ${kind}`
  ];

  const files = planFiles(plan);
  for (const ruleId of ruleIds) {
    for (const file of files) {
      if (isSuppressed(policy, file, ruleId)) {
        kind = 'deny';
        reasons.push(`${ruleId} is suppressed for ${file}`);
      } else if (learning?.shouldSkipFileForRule(ruleId, file)) {
        kind = 'deny';
        reasons.push(`${ruleId} was reverted repeatedly on ${file}`);
      }
    }
  }

  if (kind === 'auto') {
    const detectOnly = ruleIds.filter((ruleId) => getMode(policy, ruleId) === 'detect-only');
    if (detectOnly.length > 0) {
      kind = 'suggest';
      reasons.push(`detect-only mode: ${detectOnly.join(', ')}`);
    }
  }

  if (kind === 'auto' && learning?.shouldSkipContext(key, context.skipContextThreshold)) {
    kind = 'suggest';
    reasons.push(`context ${key} has a high revert rate`);
  }

  return { decision: kind, score, thresholds, rule_ids: ruleIds, context_key: key, reasons };
}
