import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  createReceipt,
  isIdempotentTransformation,
  parseReceipt,
  receiptId,
  verifyReceipt,
  verifyReceipts
} from '../receipts.js';
import { Journal } from '../../journal/journal.js';
import { getJournalsDir } from '../../store/ace-root.js';
import { sha256Hex } from '../../util/hash.js';

describe('receipts', () => {
  it('seals raw hex hashes and a millisecond UTC timestamp', () => {
    const receipt = createReceipt('plan-1', 'a.ts', 'x = 1', 'x = 2', true, true, 0.1, 50);
    expect(receipt.before_hash).toBe(sha256Hex('x = 1'));
    expect(receipt.after_hash).toBe(sha256Hex('x = 2'));
    expect(receipt.after_hash).toMatch(/^[0-9a-f]{64}$/);
    expect(receipt.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect('policy_hash' in receipt).toBe(false);
    expect(createReceipt('p', 'a.ts', '', '', true, true, 0, 0, 'abcd').policy_hash).toBe('abcd');
  });

  it('verifies the sealed content and rejects a one-byte change', () => {
    const after = 'export const value = 42;\n';
    const receipt = createReceipt('plan-1', 'a.ts', '', after, true, true, 0.2, 5);
    expect(verifyReceipt(receipt, after)).toBe(true);
    expect(verifyReceipt(receipt, Buffer.from(after))).toBe(true);
    expect(verifyReceipt(receipt, after.replace('42', '43'))).toBe(false);
  });

  it('detects idempotent transformations', () => {
    expect(isIdempotentTransformation('x = 1', 'x = 1')).toBe(true);
    expect(isIdempotentTransformation('x = 1', 'x = 2')).toBe(false);
  });

  it('derives a stable id and validates receipts read from disk', () => {
    const receipt = createReceipt('plan-1', 'a.ts', 'a', 'b', true, false, 0.5, 7);
    expect(receiptId(receipt)).toMatch(/^[0-9a-f]{16}$/);
    expect(receiptId(parseReceipt(JSON.parse(JSON.stringify(receipt))))).toBe(receiptId(receipt));
    expect(() => parseReceipt({ plan_id: 'p' })).toThrow();
  });
});

describe('verifyReceipts', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'verify-receipts-test-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function sealed(file: string, content: string): void {
    fs.writeFileSync(path.join(root, file), content);
    const receipt = createReceipt('plan-1', file, '', content, true, true, 0.1, 1);
    const journal = new Journal('r1', getJournalsDir(root));
    journal.logSuccess(file, receipt.after_hash, Buffer.byteLength(content), receiptId(receipt), receipt);
    journal.close();
  }

  it('finds nothing wrong without journals', () => {
    expect(verifyReceipts(root)).toEqual([]);
    fs.mkdirSync(getJournalsDir(root), { recursive: true });
    expect(verifyReceipts(root)).toEqual([]);
  });

  it('passes while files match their receipts', () => {
    sealed('a.ts', 'const a = 1;\n');
    expect(verifyReceipts(root)).toEqual([]);
  });

  it('reports a hash mismatch', () => {
    sealed('a.ts', 'const a = 1;\n');
    fs.writeFileSync(path.join(root, 'a.ts'), 'const a = 2;\n');
    const expected = sha256Hex('const a = 1;\n').slice(0, 8);
    expect(verifyReceipts(root)).toEqual([`r1.jsonl:1 - Hash mismatch for a.ts (expected ${expected}...)`]);
  });

  it('reports deleted files and invalid lines', () => {
    sealed('a.ts', 'const a = 1;\n');
    fs.rmSync(path.join(root, 'a.ts'));
    fs.appendFileSync(path.join(getJournalsDir(root), 'r1.jsonl'), '{oops\n');
    expect(verifyReceipts(root)).toEqual(['r1.jsonl:1 - File no longer exists: a.ts', 'r1.jsonl:2 - Invalid JSON']);
  });

  it('ignores success lines without a receipt', () => {
    const journal = new Journal('r2', getJournalsDir(root));
    journal.logSuccess('gone.ts', sha256Hex('x'), 1, 'r');
    journal.close();
    expect(verifyReceipts(root)).toEqual([]);
  });
});
