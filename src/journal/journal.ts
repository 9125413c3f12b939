/**
 * Append-only run journal.
 *
 * Format: JSONL, one sorted-key object per line
 * Location: <dir>/<run_id>.jsonl
 * Every append is fsynced before the call returns, so an intent is durable
 * before the target file is touched.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Receipt } from '../types/schemas.js';
import { errorMessage, OperationalError } from '../errors.js';
import { isoTimestamp } from '../store/run-id.js';
import { stableStringify } from '../util/stable-json.js';
import type { IntentEntry, JournalEntry, RevertEntry, SuccessEntry } from './types.js';

export class Journal {
  readonly runId: string;
  readonly journalPath: string;
  private fd: number | null;

  constructor(runId: string, dir: string) {
    this.runId = runId;
    this.journalPath = path.join(dir, `${runId}.jsonl`);
    fs.mkdirSync(dir, { recursive: true });
    // A run's journal is created once; an existing file belongs to an earlier run
    try {
      this.fd = fs.openSync(this.journalPath, 'ax');
    } catch (err) {
      throw new OperationalError(`Cannot open journal for run ${runId}: ${errorMessage(err)}`);
    }
  }

  get closed(): boolean {
    return this.fd === null;
  }

  /**
   * Record the intent to modify `file`. Must precede any write to it.
   * `preImage` is the complete original content.
   */
  logIntent(
    file: string,
    beforeSha: string,
    beforeSize: number,
    ruleIds: readonly string[],
    planId: string,
    preImage: Buffer | string
  ): IntentEntry {
    const bytes = typeof preImage === 'string' ? Buffer.from(preImage, 'utf-8') : preImage;
    const entry: IntentEntry = {
      type: 'intent',
      timestamp: isoTimestamp(),
      file,
      before_sha: beforeSha,
      before_size: beforeSize,
      rule_ids: [...ruleIds].sort(),
      plan_id: planId,
      ...encodePreImage(bytes)
    };
    this.append(entry);
    return entry;
  }

  /** Record a durably committed write, optionally sealing its receipt into the line. */
  logSuccess(file: string, afterSha: string, afterSize: number, receiptId: string, receipt?: Receipt): SuccessEntry {
    const entry: SuccessEntry = {
      type: 'success',
      timestamp: isoTimestamp(),
      file,
      after_sha: afterSha,
      after_size: afterSize,
      receipt_id: receiptId,
      receipt: receipt ? { ...receipt } : undefined
    };
    this.append(entry);
    return entry;
  }

  logRevert(file: string, fromSha: string, toSha: string, reason: string): RevertEntry {
    const entry: RevertEntry = {
      type: 'revert',
      timestamp: isoTimestamp(),
      file,
      from_sha: fromSha,
      to_sha: toSha,
      reason
    };
    this.append(entry);
    return entry;
  }

  /** Flush and release the file. A closed journal never accepts writes again. */
  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    fs.fsyncSync(fd);
    fs.closeSync(fd);
  }

  private append(entry: JournalEntry): void {
    if (this.fd === null) {
      throw new OperationalError(`Journal ${this.runId} is closed`);
    }
    fs.writeSync(this.fd, `${stableStringify(entry)}\n`);
    fs.fsyncSync(this.fd);
  }
}

function encodePreImage(bytes: Buffer): Pick<IntentEntry, 'pre_image' | 'pre_image_encoding'> {
  const text = bytes.toString('utf-8');
  if (Buffer.from(text, 'utf-8').equals(bytes)) {
    return { pre_image: text };
  }
  return { pre_image: bytes.toString('base64'), pre_image_encoding: 'base64' };
}

/** Original bytes of an intent's pre-image. */
export function decodePreImage(entry: Pick<IntentEntry, 'pre_image' | 'pre_image_encoding'>): Buffer {
  return entry.pre_image_encoding === 'base64'
    ? Buffer.from(entry.pre_image, 'base64')
    : Buffer.from(entry.pre_image, 'utf-8');
}
