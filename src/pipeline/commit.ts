/**
 * Commit path: the only place files are written.
 *
 * policy → guard (with repair) → journal intent → atomic write → receipt
 * → integrity re-read → journal success → learning → index.
 *
 * Work on one file is serialized through a keyed mutex; different files of
 * the same plan commit concurrently. All state lives on explicit context
 * objects owned by the pipeline instance.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Edit, EditPlan, Receipt, RepairReport } from '../types/schemas.js';
import { defaultConfig, type AceConfig } from '../config/schema.js';
import { errorMessage, IntegrityError, OperationalError } from '../errors.js';
import { guardFor, verifyParse, type GuardFn } from '../guard/verifier.js';
import { isGuardedFile } from '../guard/syntax.js';
import type { ContentIndex } from '../index/content-index.js';
import { Journal } from '../journal/journal.js';
import { LearningEngine, type Outcome } from '../learning/engine.js';
import { enforcePolicy, type PolicyDecision } from '../policy/engine.js';
import { policyHash } from '../policy/config.js';
import { createReceipt, isIdempotentTransformation, receiptId, verifyReceipt } from '../receipt/receipts.js';
import { tryApplyWithRepair } from '../repair/engine.js';
import { writeRepairReport } from '../repair/report.js';
import { checkGitSafety, type GitSafetyOptions } from '../repo/git-safety.js';
import { atomicWrite } from '../store/atomic-write.js';
import { getJournalsDir, getLearnPath, getRepairsDir } from '../store/ace-root.js';
import { makeRunId } from '../store/run-id.js';
import { sha256Hex } from '../util/hash.js';
import { KeyedMutex } from './keyed-mutex.js';

export interface CommitPipelineOptions {
  /** Repository root; relative edit paths resolve against it. */
  root: string;
  runId?: string;
  config?: AceConfig;
  learning?: LearningEngine;
  index?: ContentIndex;
  journal?: Journal;
  /** Overrides config.guard.strict. */
  strict?: boolean;
  /** Overrides the guard built from `strict`. */
  guardFn?: GuardFn;
}

/**
 * - applied: every edit written
 * - partial: only the safe subset written
 * - rejected: no edit passed the guard, file untouched
 * - unchanged: edits produced identical content, nothing written
 * - failed: the file could not be committed; `error` says why
 */
export type FileCommitStatus = 'applied' | 'partial' | 'rejected' | 'unchanged' | 'failed';

export interface FileCommitResult {
  file: string;
  status: FileCommitStatus;
  receipt?: Receipt;
  report?: RepairReport;
  report_path?: string;
  error?: string;
}

export interface CommitResult {
  plan_id: string;
  policy: PolicyDecision;
  files: FileCommitResult[];
}

interface PreparedFile {
  file: string;
  absolute: string;
  edits: Edit[];
  bytes: Buffer;
  original: string;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export class CommitPipeline {
  readonly root: string;
  readonly runId: string;
  readonly config: AceConfig;
  readonly journal: Journal;
  readonly learning: LearningEngine;
  readonly index?: ContentIndex;
  private readonly guardFn: GuardFn;
  private readonly mutex = new KeyedMutex();
  private readonly policyHash: string;

  constructor(options: CommitPipelineOptions) {
    this.root = path.resolve(options.root);
    this.runId = options.runId ?? makeRunId();
    this.config = options.config ?? defaultConfig();
    const { policy } = this.config;
    this.learning =
      options.learning ??
      new LearningEngine(getLearnPath(this.root), {
        autoThreshold: policy.auto_threshold,
        suggestThreshold: policy.suggest_threshold,
        alpha: policy.alpha,
        beta: policy.beta
      });
    this.index = options.index;
    this.journal = options.journal ?? new Journal(this.runId, getJournalsDir(this.root));
    this.guardFn = options.guardFn ?? guardFor(options.strict ?? this.config.guard.strict);
    this.policyHash = policyHash(policy);
  }

  /** Refuse to start on a dirty git tree when the config asks for a clean one. */
  async checkSafety(options: GitSafetyOptions = {}): Promise<void> {
    if (!this.config.git.require_clean_tree) {
      return;
    }
    await checkGitSafety(this.root, options);
  }

  /**
   * Commit one plan.
   *
   * Files commit independently: a file that fails once work has started
   * (changed by another plan while waiting for its lock, a failed write,
   * an integrity mismatch after the write) comes back as `failed` while
   * its siblings keep their own results and receipts.
   *
   * @throws OperationalError when an original file cannot be read or does
   *   not parse; nothing is written or journaled in that case
   */
  async commit(plan: EditPlan): Promise<CommitResult> {
    const decision = enforcePolicy(plan, {
      learning: this.learning,
      policy: this.config.policy,
      skipContextThreshold: this.config.learning.skip_context_threshold
    });

    if (decision.decision === 'deny') {
      return { plan_id: plan.id, policy: decision, files: [] };
    }
    if (decision.decision === 'suggest') {
      this.record(decision, 'suggested');
      return { plan_id: plan.id, policy: decision, files: [] };
    }

    const prepared = this.prepare(plan);
    const files = await Promise.all(
      prepared.map((entry) =>
        this.mutex.run(entry.absolute, async (): Promise<FileCommitResult> => {
          try {
            return await this.commitFile(plan, decision, entry);
          } catch (err) {
            console.warn(`[commit] ${entry.file}: ${errorMessage(err)}`);
            return { file: entry.file, status: 'failed', error: errorMessage(err) };
          }
        })
      )
    );
    return { plan_id: plan.id, policy: decision, files };
  }

  /** Close the journal for good and persist the index. */
  close(): void {
    this.journal.close();
    this.index?.save();
  }

  // Read and parse-check every original before anything is written
  private prepare(plan: EditPlan): PreparedFile[] {
    const byFile = new Map<string, Edit[]>();
    for (const edit of plan.edits) {
      const list = byFile.get(edit.file) ?? [];
      list.push(edit);
      byFile.set(edit.file, list);
    }

    return [...byFile.keys()].sort().map((file) => {
      const absolute = path.resolve(this.root, file);
      let bytes: Buffer;
      try {
        bytes = fs.readFileSync(absolute);
      } catch (err) {
        throw new OperationalError(`Cannot read ${file}: ${errorMessage(err)}`);
      }

      let original: string;
      try {
        original = utf8.decode(bytes);
      } catch {
        throw new OperationalError(`${file} is not valid UTF-8`);
      }

      if (isGuardedFile(file)) {
        const parsed = verifyParse(original, file);
        if (!parsed.ok) {
          throw new OperationalError(`Original ${file} does not parse: ${parsed.errors[0] ?? 'unknown error'}`);
        }
      }
      return { file, absolute, edits: byFile.get(file) ?? [], bytes, original };
    });
  }

  private async commitFile(plan: EditPlan, decision: PolicyDecision, entry: PreparedFile): Promise<FileCommitResult> {
    const { file, absolute, bytes, original } = entry;
    const started = performance.now();

    // Another plan may have committed this file while we waited for the lock
    if (!fs.readFileSync(absolute).equals(bytes)) {
      throw new OperationalError(`${file} changed while plan ${plan.id} was waiting to commit`);
    }

    const attempt = tryApplyWithRepair(file, entry.edits, original, this.guardFn, this.runId);
    const result: FileCommitResult = { file, status: 'applied' };
    if (attempt.report) {
      result.report = attempt.report;
      result.report_path = writeRepairReport(attempt.report, getRepairsDir(this.root));
    }

    if (!attempt.success) {
      console.warn(`[commit] ${file}: no edit of plan ${plan.id} passed the guard`);
      this.record(decision, 'skipped', file);
      return { ...result, status: 'rejected' };
    }
    if (isIdempotentTransformation(original, attempt.content)) {
      return { ...result, status: 'unchanged' };
    }

    this.journal.logIntent(file, sha256Hex(bytes), bytes.length, decision.rule_ids, plan.id, bytes);
    await atomicWrite(absolute, attempt.content);

    const receipt = createReceipt(
      plan.id,
      file,
      original,
      attempt.content,
      isGuardedFile(file),
      true,
      plan.estimated_risk,
      Math.round(performance.now() - started),
      this.policyHash
    );

    const written = fs.readFileSync(absolute);
    if (!verifyReceipt(receipt, written)) {
      throw new IntegrityError(file, `Content of ${file} does not match its receipt right after the write`);
    }

    this.journal.logSuccess(file, receipt.after_hash, written.length, receiptId(receipt), receipt);
    this.record(decision, 'applied', file);
    this.index?.addFile(absolute, true);

    return { ...result, status: attempt.partial_apply ? 'partial' : 'applied', receipt };
  }

  private record(decision: PolicyDecision, outcome: Outcome, file?: string): void {
    for (const ruleId of decision.rule_ids) {
      this.learning.recordOutcome(ruleId, outcome, decision.context_key, file);
    }
  }
}
