import fs from 'node:fs';
import path from 'node:path';
import { atomicWrite } from '../store/atomic-write.js';
import { errorMessage } from '../errors.js';
import { sha256Hex } from '../util/hash.js';
import type { LearningEngine } from '../learning/engine.js';
import { decodePreImage, type Journal } from './journal.js';
import { journalEntrySchema, type IntentEntry, type JournalEntry, type RevertContext } from './types.js';

/**
 * Parse a journal file. A missing file is an empty journal.
 * Lines that are not valid entries are logged and skipped.
 */
export function readJournal(journalPath: string): JournalEntry[] {
  if (!fs.existsSync(journalPath)) {
    return [];
  }

  const entries: JournalEntry[] = [];
  const lines = fs.readFileSync(journalPath, 'utf-8').split('\n');
  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      console.warn(`[journal] ${path.basename(journalPath)}:${index + 1} - Invalid JSON, skipped`);
      return;
    }
    const result = journalEntrySchema.safeParse(parsed);
    if (!result.success) {
      console.warn(
        `[journal] ${path.basename(journalPath)}:${index + 1} - ${result.error.issues[0]?.message ?? 'Invalid entry'}, skipped`
      );
      return;
    }
    entries.push(result.data);
  });
  return entries;
}

/**
 * Build the list of committed modifications recorded in a journal.
 *
 * Each `success` is paired with the latest unmatched `intent` for the same
 * file. Intents that never reached `success` are excluded: nothing was
 * committed for them. A later `revert` from a pair's post-commit hash
 * retires that pair. Contexts come back in journal order; execute them
 * newest-first.
 */
export function buildRevertPlan(journalPath: string): RevertContext[] {
  const pendingIntents = new Map<string, IntentEntry[]>();
  const plan: RevertContext[] = [];

  for (const entry of readJournal(journalPath)) {
    switch (entry.type) {
      case 'intent': {
        const stack = pendingIntents.get(entry.file) ?? [];
        stack.push(entry);
        pendingIntents.set(entry.file, stack);
        break;
      }
      case 'success': {
        const intent = pendingIntents.get(entry.file)?.pop();
        if (!intent) {
          break;
        }
        plan.push({
          file: entry.file,
          expected_current_sha: entry.after_sha,
          original_sha: intent.before_sha,
          restore_content: decodePreImage(intent),
          plan_id: intent.plan_id,
          rule_ids: [...intent.rule_ids]
        });
        break;
      }
      case 'revert': {
        for (let i = plan.length - 1; i >= 0; i--) {
          const ctx = plan[i];
          if (ctx.file === entry.file && ctx.expected_current_sha === entry.from_sha) {
            plan.splice(i, 1);
            break;
          }
        }
        break;
      }
    }
  }

  return plan;
}

/** Journal with the most recent modification time, or null. */
export function findLatestJournal(journalDir: string): string | null {
  if (!fs.existsSync(journalDir)) {
    return null;
  }

  const journals = fs
    .readdirSync(journalDir)
    .filter((name) => name.endsWith('.jsonl'))
    .map((name) => {
      const full = path.join(journalDir, name);
      return { full, name, mtime: fs.statSync(full).mtimeMs };
    });
  if (journals.length === 0) {
    return null;
  }

  // Ties broken by name; run ids sort chronologically
  journals.sort((a, b) => b.mtime - a.mtime || (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));
  return journals[0].full;
}

export function getJournalIdFromPath(journalPath: string): string {
  return path.basename(journalPath, '.jsonl');
}

export interface RevertOptions {
  /** Base for relative journal paths. Defaults to the working directory. */
  root?: string;
  /** Receives one `revert` entry per restored file. */
  journal?: Journal;
  /** Counts a `reverted` outcome for every rule of each restored change. */
  learning?: LearningEngine;
  reason?: string;
}

export interface SkippedRevert {
  file: string;
  reason: string;
}

export interface RevertOutcome {
  reverted: string[];
  skipped: SkippedRevert[];
}

/**
 * Restore pre-images, newest modification first.
 *
 * A file is only restored when its current hash is the one the journal says
 * the commit produced. Files changed since, already restored, or deleted are
 * reported in `skipped` and left alone.
 */
export async function executeRevertPlan(
  plan: readonly RevertContext[],
  options: RevertOptions = {}
): Promise<RevertOutcome> {
  const root = options.root ?? process.cwd();
  const reason = options.reason ?? 'manual';
  const outcome: RevertOutcome = { reverted: [], skipped: [] };

  for (const ctx of [...plan].reverse()) {
    const target = path.resolve(root, ctx.file);

    let current: Buffer;
    try {
      current = fs.readFileSync(target);
    } catch (err) {
      outcome.skipped.push({ file: ctx.file, reason: `Cannot read file: ${errorMessage(err)}` });
      continue;
    }

    const currentSha = sha256Hex(current);
    if (currentSha === ctx.original_sha) {
      outcome.skipped.push({ file: ctx.file, reason: 'Already at original content' });
      continue;
    }
    if (currentSha !== ctx.expected_current_sha) {
      outcome.skipped.push({
        file: ctx.file,
        reason: `Modified since commit (expected ${ctx.expected_current_sha.slice(0, 8)}..., found ${currentSha.slice(0, 8)}...)`
      });
      continue;
    }
    if (sha256Hex(ctx.restore_content) !== ctx.original_sha) {
      outcome.skipped.push({ file: ctx.file, reason: 'Pre-image does not match the recorded original hash' });
      continue;
    }

    await atomicWrite(target, ctx.restore_content);
    options.journal?.logRevert(ctx.file, currentSha, ctx.original_sha, reason);
    for (const ruleId of ctx.rule_ids) {
      options.learning?.recordOutcome(ruleId, 'reverted', undefined, ctx.file);
    }
    outcome.reverted.push(ctx.file);
  }

  return outcome;
}
