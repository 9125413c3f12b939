/**
 * Learning engine - adaptive thresholds from observed outcomes.
 *
 * Counters only: no models, no decay. Per rule it tracks applied, reverted,
 * suggested and skipped outcomes; per context fingerprint it tracks hits and
 * reverts; per (rule, file) it tracks consecutive reverts for auto-skip.
 *
 * Persists to: .ace/learn.json as {rules, contexts, tuning}
 */

import fs from 'node:fs';
import { z } from 'zod';
import type { EditPlan } from '../types/schemas.js';
import { AUTO_THRESHOLD, DEFAULT_ALPHA, DEFAULT_BETA, SUGGEST_THRESHOLD } from '../config/schema.js';
import { errorMessage } from '../errors.js';
import { atomicWriteSync } from '../store/atomic-write.js';
import { isoTimestamp } from '../store/run-id.js';
import { sha256Hex } from '../util/hash.js';
import { stableJson } from '../util/stable-json.js';

export const FLOOR_MIN_AUTO = 0.6;
export const CEIL_MIN_AUTO = 0.85;
export const THRESHOLD_DELTA = 0.05;
export const HIGH_REVERT_RATE = 0.25;
export const HIGH_APPLY_RATE = 0.8;
export const MIN_SAMPLE_SIZE = 5;
export const REVERT_THRESHOLD_SKIPLIST = 3;
export const MIN_CONTEXT_HITS = 3;

const SNIPPET_PREFIX_CHARS = 100;

export const outcomeSchema = z.enum(['applied', 'reverted', 'suggested', 'skipped']);
export type Outcome = z.infer<typeof outcomeSchema>;

const counter = z.number().int().min(0).default(0);

const ruleStatsSchema = z.object({
  applied: counter,
  reverted: counter,
  suggested: counter,
  skipped: counter,
  last_updated: z.string().default(''),
  // file -> consecutive reverted outcomes
  consecutive_reverts: z.record(z.number().int().min(0)).default({})
});

const contextStatsSchema = z.object({
  hits: counter,
  reverts: counter
});

const learningDataSchema = z.object({
  rules: z.record(ruleStatsSchema).default({}),
  contexts: z.record(contextStatsSchema).default({}),
  tuning: z.record(z.number()).default({})
});

export type RuleStats = z.infer<typeof ruleStatsSchema>;
export type ContextStats = z.infer<typeof contextStatsSchema>;
export type LearningData = z.infer<typeof learningDataSchema>;

export interface TunedThresholds {
  auto: number;
  suggest: number;
}

export interface TunedRule {
  rule_id: string;
  threshold: number;
  stats: RuleStats;
}

export interface RuleRevertRate {
  rule_id: string;
  stats: RuleStats;
  revert_rate: number;
}

export interface LearningEngineOptions {
  /** Base thresholds before any tuning; policy config supplies these. */
  autoThreshold?: number;
  suggestThreshold?: number;
  alpha?: number;
  beta?: number;
}

/** Applied plus reverted: the outcomes that say whether a rule was right. */
export function sampleSize(stats: RuleStats): number {
  return stats.applied + stats.reverted;
}

export function revertRate(stats: RuleStats): number {
  const total = sampleSize(stats);
  return total === 0 ? 0 : stats.reverted / total;
}

export function applyRate(stats: RuleStats): number {
  const total = sampleSize(stats);
  return total === 0 ? 0 : stats.applied / total;
}

export function contextRevertRate(stats: ContextStats): number {
  return stats.hits === 0 ? 0 : stats.reverts / stats.hits;
}

function emptyRuleStats(): RuleStats {
  return { applied: 0, reverted: 0, suggested: 0, skipped: 0, last_updated: '', consecutive_reverts: {} };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

// Keeps 0.7 - 0.05 from printing as 0.6499999999999999
function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export class LearningEngine {
  readonly learnPath: string;
  private readonly base: Required<LearningEngineOptions>;
  private data: LearningData | null = null;

  constructor(learnPath: string, options: LearningEngineOptions = {}) {
    this.learnPath = learnPath;
    this.base = {
      autoThreshold: options.autoThreshold ?? AUTO_THRESHOLD,
      suggestThreshold: options.suggestThreshold ?? SUGGEST_THRESHOLD,
      alpha: options.alpha ?? DEFAULT_ALPHA,
      beta: options.beta ?? DEFAULT_BETA
    };
  }

  /** Current data, loaded from disk on first access. */
  get snapshot(): LearningData {
    return this.ensureLoaded();
  }

  /**
   * Load from disk. Missing or corrupted files yield empty data; corruption
   * is logged, never thrown.
   */
  load(): LearningData {
    this.data = this.readFromDisk();
    return this.data;
  }

  save(): void {
    atomicWriteSync(this.learnPath, stableJson(this.ensureLoaded()));
  }

  /**
   * Count one outcome for a rule and persist immediately.
   *
   * With `filePath`, consecutive reverts for (rule, file) are tracked: a
   * `reverted` outcome extends the streak, anything else ends it.
   * With `contextKey`, the context's hits (and reverts) are counted too.
   */
  recordOutcome(ruleId: string, outcome: Outcome, contextKey?: string, filePath?: string): void {
    const data = this.ensureLoaded();
    const stats = data.rules[ruleId] ?? emptyRuleStats();
    data.rules[ruleId] = stats;

    stats[outcome] += 1;
    stats.last_updated = isoTimestamp();

    if (filePath) {
      if (outcome === 'reverted') {
        stats.consecutive_reverts[filePath] = (stats.consecutive_reverts[filePath] ?? 0) + 1;
      } else if (filePath in stats.consecutive_reverts) {
        stats.consecutive_reverts[filePath] = 0;
      }
    }

    if (contextKey) {
      const ctx = data.contexts[contextKey] ?? { hits: 0, reverts: 0 };
      ctx.hits += 1;
      if (outcome === 'reverted') {
        ctx.reverts += 1;
      }
      data.contexts[contextKey] = ctx;
    }

    this.save();
  }

  getRuleStats(ruleId: string): RuleStats | undefined {
    const stats = this.ensureLoaded().rules[ruleId];
    return stats ? { ...stats, consecutive_reverts: { ...stats.consecutive_reverts } } : undefined;
  }

  /** Threshold for auto-apply after tuning, always within [FLOOR_MIN_AUTO, CEIL_MIN_AUTO]. */
  tunedThreshold(ruleId: string): number {
    const data = this.ensureLoaded();
    const baseAuto = data.tuning.min_auto ?? this.base.autoThreshold;
    const stats = data.rules[ruleId];

    let minAuto = baseAuto;
    if (stats && sampleSize(stats) >= MIN_SAMPLE_SIZE) {
      if (revertRate(stats) > HIGH_REVERT_RATE) {
        minAuto = baseAuto + THRESHOLD_DELTA;
      } else if (applyRate(stats) > HIGH_APPLY_RATE) {
        minAuto = baseAuto - THRESHOLD_DELTA;
      }
    }
    return round(clamp(minAuto, FLOOR_MIN_AUTO, CEIL_MIN_AUTO));
  }

  /** The suggest threshold is never tuned. */
  tunedThresholds(ruleId: string): TunedThresholds {
    const suggest = this.ensureLoaded().tuning.min_suggest ?? this.base.suggestThreshold;
    return { auto: this.tunedThreshold(ruleId), suggest };
  }

  /** True once a rule has been reverted on a file REVERT_THRESHOLD_SKIPLIST times in a row. */
  shouldSkipFileForRule(ruleId: string, filePath: string): boolean {
    const streak = this.ensureLoaded().rules[ruleId]?.consecutive_reverts[filePath] ?? 0;
    return streak >= REVERT_THRESHOLD_SKIPLIST;
  }

  /** Needs at least MIN_CONTEXT_HITS observations before it will say yes. */
  shouldSkipContext(contextKey: string, threshold = 0.5): boolean {
    const ctx = this.ensureLoaded().contexts[contextKey];
    if (!ctx || ctx.hits < MIN_CONTEXT_HITS) {
      return false;
    }
    return contextRevertRate(ctx) > threshold;
  }

  /** Rules whose tuned threshold moved off the base, most conservative first. */
  getTunedRules(): TunedRule[] {
    const data = this.ensureLoaded();
    const baseAuto = data.tuning.min_auto ?? this.base.autoThreshold;
    const tuned: TunedRule[] = [];

    for (const ruleId of Object.keys(data.rules).sort()) {
      const stats = data.rules[ruleId];
      if (sampleSize(stats) < MIN_SAMPLE_SIZE) {
        continue;
      }
      const threshold = this.tunedThreshold(ruleId);
      if (Math.abs(threshold - baseAuto) > 0.001) {
        tuned.push({ rule_id: ruleId, threshold, stats: { ...stats } });
      }
    }

    return tuned.sort((a, b) => b.threshold - a.threshold);
  }

  /** Rules with at least two applied/reverted outcomes, highest revert rate first. */
  getTopRulesByRevertRate(limit = 10): RuleRevertRate[] {
    const data = this.ensureLoaded();
    const rates: RuleRevertRate[] = [];

    for (const ruleId of Object.keys(data.rules).sort()) {
      const stats = data.rules[ruleId];
      if (sampleSize(stats) >= 2) {
        rates.push({ rule_id: ruleId, stats: { ...stats }, revert_rate: revertRate(stats) });
      }
    }

    return rates.sort((a, b) => b.revert_rate - a.revert_rate).slice(0, limit);
  }

  /** Forget everything, on disk included. */
  reset(): void {
    this.data = this.emptyData();
    fs.rmSync(this.learnPath, { force: true });
  }

  private ensureLoaded(): LearningData {
    return this.data ?? this.load();
  }

  private emptyData(): LearningData {
    return {
      rules: {},
      contexts: {},
      tuning: {
        alpha: this.base.alpha,
        beta: this.base.beta,
        min_auto: this.base.autoThreshold,
        min_suggest: this.base.suggestThreshold
      }
    };
  }

  private readFromDisk(): LearningData {
    if (!fs.existsSync(this.learnPath)) {
      return this.emptyData();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.learnPath, 'utf-8'));
    } catch (err) {
      console.warn(`[learning] Ignoring corrupted ${this.learnPath}: ${errorMessage(err)}`);
      return this.emptyData();
    }

    const result = learningDataSchema.safeParse(parsed);
    if (!result.success) {
      console.warn(
        `[learning] Ignoring invalid ${this.learnPath}: ${result.error.issues[0]?.message ?? 'schema mismatch'}`
      );
      return this.emptyData();
    }
    return { ...result.data, tuning: { ...this.emptyData().tuning, ...result.data.tuning } };
  }
}

/**
 * Deterministic fingerprint of the situation a plan addresses:
 * `<file>:<rule>:<sha256(snippet[0:100])[0:8]>` of its first finding.
 * Plan ids play no part, so identical plans share a key.
 */
export function contextKey(plan: Pick<EditPlan, 'findings'>): string {
  const first = plan.findings[0];
  if (!first) {
    return 'no-findings';
  }
  const snippet = (first.snippet ?? '').slice(0, SNIPPET_PREFIX_CHARS);
  return `${first.file}:${first.rule}:${sha256Hex(snippet).slice(0, 8)}`;
}

/** Unique rule ids addressed by a plan, sorted. */
export function getRuleIdsFromPlan(plan: Pick<EditPlan, 'findings'>): string[] {
  return [...new Set(plan.findings.map((f) => f.rule))].sort();
}
