import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Edit, EditPlan, Severity } from '../../src/types/schemas.js';
import { OperationalError } from '../../src/errors.js';
import { CommitPipeline } from '../../src/pipeline/commit.js';
import { buildRevertPlan, executeRevertPlan, readJournal } from '../../src/journal/revert.js';
import { verifyReceipts } from '../../src/receipt/receipts.js';
import { sha256Hex } from '../../src/util/hash.js';

const RUN_ID = '20260101000000';
const ORIGINAL = 'const a = 1;\nconst b = 2;\n';

function replace(line: number, payload: string, file = 'a.ts'): Edit {
  return { file, op: 'replace', start_line: line, end_line: line, payload };
}

function plan(edits: Edit[], severity: Severity = 'critical', id = 'plan-1'): EditPlan {
  return {
    id,
    edits,
    findings: [{ file: 'a.ts', line: 1, rule: 'R1', severity, message: 'literal should change', snippet: 'const a = 1;' }],
    invariants: [],
    estimated_risk: 0.2
  };
}

describe('CommitPipeline', () => {
  let root: string;
  let pipeline: CommitPipeline;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'commit-test-'));
    fs.writeFileSync(path.join(root, 'a.ts'), ORIGINAL);
    pipeline = new CommitPipeline({ root, runId: RUN_ID });
  });

  afterEach(() => {
    pipeline.close();
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  function read(file = 'a.ts'): string {
    return fs.readFileSync(path.join(root, file), 'utf-8');
  }

  it('applies an approved plan with a journal entry and a receipt', async () => {
    const result = await pipeline.commit(plan([replace(1, 'const a = 10;')]));

    expect(result.policy.decision).toBe('auto');
    expect(result.files).toHaveLength(1);
    expect(result.files[0].status).toBe('applied');
    expect(result.files[0].report).toBeUndefined();
    expect(read()).toBe('const a = 10;\nconst b = 2;\n');

    const receipt = result.files[0].receipt;
    expect(receipt).toMatchObject({
      plan_id: 'plan-1',
      file: 'a.ts',
      before_hash: sha256Hex(ORIGINAL),
      after_hash: sha256Hex('const a = 10;\nconst b = 2;\n'),
      parse_valid: true,
      invariants_met: true,
      estimated_risk: 0.2
    });
    expect(receipt?.policy_hash).toMatch(/^[0-9a-f]{16}$/);

    pipeline.close();
    const entries = readJournal(path.join(root, '.ace', 'journals', `${RUN_ID}.jsonl`));
    expect(entries.map((e) => e.type)).toEqual(['intent', 'success']);
    expect(entries[0]).toMatchObject({ file: 'a.ts', before_sha: sha256Hex(ORIGINAL), rule_ids: ['R1'], plan_id: 'plan-1' });
    expect(verifyReceipts(root)).toEqual([]);
    expect(pipeline.learning.getRuleStats('R1')).toMatchObject({ applied: 1 });
  });

  it('reverts to the exact original bytes', async () => {
    await pipeline.commit(plan([replace(1, 'const a = 10;')]));
    pipeline.close();

    const outcome = await executeRevertPlan(buildRevertPlan(pipeline.journal.journalPath), { root });
    expect(outcome.reverted).toEqual(['a.ts']);
    expect(read()).toBe(ORIGINAL);
    expect(verifyReceipts(root)).toHaveLength(1);
  });

  it('writes only the safe subset and a repair report', async () => {
    const result = await pipeline.commit(plan([replace(1, 'const a = 10;'), replace(2, 'const b = ;')]));

    expect(result.files[0].status).toBe('partial');
    expect(read()).toBe('const a = 10;\nconst b = 2;\n');
    expect(result.files[0].report).toMatchObject({
      run_id: RUN_ID,
      file: 'a.ts',
      total_edits: 2,
      safe_edit_indices: [0],
      failed_edit_indices: [1]
    });

    const reportPath = path.join(root, '.ace', 'repairs', `${RUN_ID}-a.ts.json`);
    expect(result.files[0].report_path).toBe(reportPath);
    expect(JSON.parse(fs.readFileSync(reportPath, 'utf-8'))).toMatchObject({ safe_edits: 1, failed_edits: 1 });
  });

  it('leaves the file untouched when no edit is safe', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = await pipeline.commit(plan([replace(2, 'const b = ;')]));

    expect(result.files[0].status).toBe('rejected');
    expect(read()).toBe(ORIGINAL);
    expect(warn).toHaveBeenCalledWith('[commit] a.ts: no edit of plan plan-1 passed the guard');

    pipeline.close();
    expect(readJournal(pipeline.journal.journalPath)).toEqual([]);
    expect(pipeline.learning.getRuleStats('R1')).toMatchObject({ skipped: 1, applied: 0 });
  });

  it('does not journal edits that change nothing', async () => {
    const result = await pipeline.commit(plan([replace(1, 'const a = 1;')]));
    expect(result.files[0].status).toBe('unchanged');

    pipeline.close();
    expect(readJournal(pipeline.journal.journalPath)).toEqual([]);
  });

  it('refuses to touch an original that does not parse', async () => {
    fs.writeFileSync(path.join(root, 'a.ts'), 'const = ;\n');

    await expect(pipeline.commit(plan([replace(1, 'const a = 1;')]))).rejects.toBeInstanceOf(OperationalError);
    expect(read()).toBe('const = ;\n');
  });

  it('fails before writing anything when a file is missing', async () => {
    const edits = [replace(1, 'const a = 10;'), replace(1, 'const z = 0;', 'missing.ts')];

    await expect(pipeline.commit(plan(edits))).rejects.toThrow(/^Cannot read missing\.ts: /);
    expect(read()).toBe(ORIGINAL);
  });

  it('keeps sibling results when one file of a plan goes stale', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    fs.writeFileSync(path.join(root, 'b.ts'), 'const b = 1;\n');

    const first = pipeline.commit(plan([replace(1, 'const a = 10;')], 'critical', 'p1'));
    const second = pipeline.commit(
      plan([replace(1, 'const a = 20;'), replace(1, 'const b = 3;', 'b.ts')], 'critical', 'p2')
    );
    const [one, two] = await Promise.all([first, second]);

    expect(one.files.map((f) => [f.file, f.status])).toEqual([['a.ts', 'applied']]);
    expect(two.files.map((f) => [f.file, f.status])).toEqual([
      ['a.ts', 'failed'],
      ['b.ts', 'applied']
    ]);
    expect(two.files[0].error).toBe('a.ts changed while plan p2 was waiting to commit');
    expect(two.files[0].receipt).toBeUndefined();
    expect(two.files[1].receipt?.after_hash).toBe(sha256Hex('const b = 3;\n'));
    expect(warn).toHaveBeenCalledWith('[commit] a.ts: a.ts changed while plan p2 was waiting to commit');

    expect(read()).toBe('const a = 10;\nconst b = 2;\n');
    expect(read('b.ts')).toBe('const b = 3;\n');

    pipeline.close();
    const entries = readJournal(pipeline.journal.journalPath);
    const successes = entries.filter((e) => e.type === 'success').map((e) => e.file);
    expect(successes.sort()).toEqual(['a.ts', 'b.ts']);
    expect(entries.filter((e) => e.type === 'intent')).toHaveLength(2);
    expect(verifyReceipts(root)).toEqual([]);
  });

  it('denies low-scoring plans and records suggestions', async () => {
    const denied = await pipeline.commit(plan([replace(1, 'const a = 10;')], 'low'));
    expect(denied.policy.decision).toBe('deny');
    expect(denied.files).toEqual([]);

    const suggested = await pipeline.commit(plan([replace(1, 'const a = 10;')], 'high'));
    expect(suggested.policy.decision).toBe('suggest');
    expect(suggested.files).toEqual([]);

    expect(read()).toBe(ORIGINAL);
    expect(pipeline.learning.getRuleStats('R1')).toMatchObject({ suggested: 1, applied: 0 });
  });
});
