/**
 * Receipts - hash-sealed proof that a plan turned specific bytes into
 * specific bytes.
 *
 * Hashes are raw hex SHA-256 with no algorithm prefix. Receipts are embedded
 * in journal `success` lines, which is where verifyReceipts finds them.
 */

import fs from 'node:fs';
import path from 'node:path';
import { receiptSchema, type Receipt } from '../types/schemas.js';
import { errorMessage } from '../errors.js';
import { contentHash, stripHashPrefix } from '../util/hash.js';
import { stableStringify } from '../util/stable-json.js';
import { isoTimestamp } from '../store/run-id.js';
import { getJournalsDir } from '../store/ace-root.js';

function hashOf(content: string | Uint8Array): string {
  return stripHashPrefix(contentHash(content));
}

export function createReceipt(
  planId: string,
  file: string,
  beforeContent: string | Uint8Array,
  afterContent: string | Uint8Array,
  parseValid: boolean,
  invariantsMet: boolean,
  estimatedRisk: number,
  durationMs: number,
  policyHash?: string
): Receipt {
  return {
    plan_id: planId,
    file,
    before_hash: hashOf(beforeContent),
    after_hash: hashOf(afterContent),
    parse_valid: parseValid,
    invariants_met: invariantsMet,
    estimated_risk: estimatedRisk,
    duration_ms: durationMs,
    timestamp: isoTimestamp(),
    // Omitted rather than empty so older readers see the same shape
    ...(policyHash ? { policy_hash: policyHash } : {})
  };
}

/** True when `currentContent` is exactly what the receipt sealed. */
export function verifyReceipt(receipt: Receipt, currentContent: string | Uint8Array): boolean {
  return hashOf(currentContent) === receipt.after_hash;
}

/** True when the transformation changed nothing. */
export function isIdempotentTransformation(before: string | Uint8Array, after: string | Uint8Array): boolean {
  return hashOf(before) === hashOf(after);
}

/**
 * Stable identifier for a receipt: the first 16 hex chars of the sha256
 * of its sorted-key JSON.
 */
export function receiptId(receipt: Receipt): string {
  return hashOf(stableStringify(receipt)).slice(0, 16);
}

/** Validate a receipt read from disk. Throws a ZodError on bad input. */
export function parseReceipt(input: unknown): Receipt {
  return receiptSchema.parse(input);
}

/**
 * Cross-check every receipt embedded in `<rootDir>/.ace/journals/*.jsonl`
 * against the files on disk.
 *
 * @returns failure messages, empty when everything matches
 */
export function verifyReceipts(rootDir: string): string[] {
  const journalsDir = getJournalsDir(rootDir);
  const failures: string[] = [];

  if (!fs.existsSync(journalsDir)) {
    return failures;
  }

  const journals = fs
    .readdirSync(journalsDir)
    .filter((name) => name.endsWith('.jsonl'))
    .sort();

  for (const journalName of journals) {
    let raw: string;
    try {
      raw = fs.readFileSync(path.join(journalsDir, journalName), 'utf-8');
    } catch (err) {
      failures.push(`${journalName} - Cannot read journal: ${errorMessage(err)}`);
      continue;
    }

    raw.split('\n').forEach((text, index) => {
      const line = text.trim();
      if (!line) {
        return;
      }
      const where = `${journalName}:${index + 1}`;

      let entry: unknown;
      try {
        entry = JSON.parse(line);
      } catch {
        failures.push(`${where} - Invalid JSON`);
        return;
      }

      const receipt = embeddedReceipt(entry);
      if (receipt === undefined) {
        return;
      }
      if (receipt === null) {
        failures.push(`${where} - Malformed receipt`);
        return;
      }

      const filePath = path.resolve(rootDir, receipt.file);
      if (!fs.existsSync(filePath)) {
        failures.push(`${where} - File no longer exists: ${receipt.file}`);
        return;
      }

      try {
        if (!verifyReceipt(receipt, fs.readFileSync(filePath))) {
          failures.push(`${where} - Hash mismatch for ${receipt.file} (expected ${receipt.after_hash.slice(0, 8)}...)`);
        }
      } catch (err) {
        failures.push(`${where} - Cannot read ${receipt.file}: ${errorMessage(err)}`);
      }
    });
  }

  return failures;
}

/**
 * Receipt carried by a `success` line: undefined when the line has none,
 * null when it has one that does not validate.
 */
function embeddedReceipt(entry: unknown): Receipt | null | undefined {
  if (typeof entry !== 'object' || entry === null || !('type' in entry) || entry.type !== 'success') {
    return undefined;
  }
  if (!('receipt' in entry) || entry.receipt === undefined) {
    return undefined;
  }
  const result = receiptSchema.safeParse(entry.receipt);
  return result.success ? result.data : null;
}
