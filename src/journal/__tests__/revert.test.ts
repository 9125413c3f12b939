import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Journal } from '../journal.js';
import { buildRevertPlan, executeRevertPlan, readJournal } from '../revert.js';
import { atomicWrite } from '../../store/atomic-write.js';
import { LearningEngine } from '../../learning/engine.js';
import { sha256Hex } from '../../util/hash.js';

describe('executeRevertPlan', () => {
  let root: string;
  let journalsDir: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'revert-exec-test-'));
    journalsDir = path.join(root, '.ace', 'journals');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  async function commit(journal: Journal, file: string, before: Buffer, after: string): Promise<void> {
    journal.logIntent(file, sha256Hex(before), before.length, ['R1'], 'p1', before);
    await atomicWrite(path.join(root, file), after);
    journal.logSuccess(file, sha256Hex(after), Buffer.byteLength(after), 'r1');
  }

  it('restores the exact pre-image bytes', async () => {
    const original = Buffer.concat([Buffer.from('const a = 1;\r\n'), Buffer.from([0xc3, 0x28]), Buffer.from('\n')]);
    fs.writeFileSync(path.join(root, 'a.ts'), original);

    const journal = new Journal('run', journalsDir);
    await commit(journal, 'a.ts', original, 'const a = 2;\n');
    journal.close();

    const revertJournal = new Journal('run-revert', journalsDir);
    const outcome = await executeRevertPlan(buildRevertPlan(journal.journalPath), {
      root,
      journal: revertJournal,
      reason: 'test'
    });
    revertJournal.close();

    expect(outcome).toEqual({ reverted: ['a.ts'], skipped: [] });
    expect(fs.readFileSync(path.join(root, 'a.ts')).equals(original)).toBe(true);

    const [entry] = readJournal(revertJournal.journalPath);
    expect(entry).toMatchObject({
      type: 'revert',
      file: 'a.ts',
      from_sha: sha256Hex('const a = 2;\n'),
      to_sha: sha256Hex(original),
      reason: 'test'
    });
  });

  it('unwinds repeated edits newest first', async () => {
    fs.writeFileSync(path.join(root, 'a.ts'), 'v0\n');
    const journal = new Journal('run', journalsDir);
    await commit(journal, 'a.ts', Buffer.from('v0\n'), 'v1\n');
    await commit(journal, 'a.ts', Buffer.from('v1\n'), 'v2\n');
    journal.close();

    const outcome = await executeRevertPlan(buildRevertPlan(journal.journalPath), { root });
    expect(outcome.reverted).toEqual(['a.ts', 'a.ts']);
    expect(fs.readFileSync(path.join(root, 'a.ts'), 'utf-8')).toBe('v0\n');
  });

  it('leaves files modified after the commit alone', async () => {
    fs.writeFileSync(path.join(root, 'a.ts'), 'v0\n');
    const journal = new Journal('run', journalsDir);
    await commit(journal, 'a.ts', Buffer.from('v0\n'), 'v1\n');
    journal.close();

    fs.writeFileSync(path.join(root, 'a.ts'), 'edited by hand\n');
    const outcome = await executeRevertPlan(buildRevertPlan(journal.journalPath), { root });

    expect(outcome.reverted).toEqual([]);
    expect(outcome.skipped).toHaveLength(1);
    expect(outcome.skipped[0].reason).toMatch(/^Modified since commit \(expected [0-9a-f]{8}\.\.\., found [0-9a-f]{8}\.\.\.\)$/);
    expect(fs.readFileSync(path.join(root, 'a.ts'), 'utf-8')).toBe('edited by hand\n');
  });

  it('reports already-restored and deleted files as skipped', async () => {
    fs.writeFileSync(path.join(root, 'a.ts'), 'a0\n');
    fs.writeFileSync(path.join(root, 'b.ts'), 'b0\n');
    const journal = new Journal('run', journalsDir);
    await commit(journal, 'a.ts', Buffer.from('a0\n'), 'a1\n');
    await commit(journal, 'b.ts', Buffer.from('b0\n'), 'b1\n');
    journal.close();

    fs.writeFileSync(path.join(root, 'a.ts'), 'a0\n');
    fs.rmSync(path.join(root, 'b.ts'));

    const outcome = await executeRevertPlan(buildRevertPlan(journal.journalPath), { root });
    expect(outcome.reverted).toEqual([]);
    expect(outcome.skipped.map((s) => s.file)).toEqual(['b.ts', 'a.ts']);
    expect(outcome.skipped[0].reason).toMatch(/^Cannot read file: /);
    expect(outcome.skipped[1].reason).toBe('Already at original content');
  });

  it('feeds each restored change back to learning as a revert', async () => {
    const learning = new LearningEngine(path.join(root, '.ace', 'learn.json'));

    for (let round = 1; round <= 3; round++) {
      fs.writeFileSync(path.join(root, 'a.ts'), 'v0\n');
      const journal = new Journal(`run-${round}`, journalsDir);
      journal.logIntent('a.ts', sha256Hex('v0\n'), 3, ['R2', 'R1'], `p${round}`, 'v0\n');
      await atomicWrite(path.join(root, 'a.ts'), 'v1\n');
      journal.logSuccess('a.ts', sha256Hex('v1\n'), 3, `r${round}`);
      journal.close();

      const outcome = await executeRevertPlan(buildRevertPlan(journal.journalPath), { root, learning });
      expect(outcome.reverted).toEqual(['a.ts']);
      expect(learning.shouldSkipFileForRule('R1', 'a.ts')).toBe(round === 3);
    }

    expect(learning.getRuleStats('R1')).toMatchObject({ reverted: 3, consecutive_reverts: { 'a.ts': 3 } });
    expect(learning.shouldSkipFileForRule('R2', 'a.ts')).toBe(true);
  });

  it('records nothing for skipped files', async () => {
    const learning = new LearningEngine(path.join(root, '.ace', 'learn.json'));
    fs.writeFileSync(path.join(root, 'a.ts'), 'v0\n');
    const journal = new Journal('run', journalsDir);
    await commit(journal, 'a.ts', Buffer.from('v0\n'), 'v1\n');
    journal.close();
    fs.writeFileSync(path.join(root, 'a.ts'), 'edited by hand\n');

    await executeRevertPlan(buildRevertPlan(journal.journalPath), { root, learning });
    expect(learning.getRuleStats('R1')).toBeUndefined();
  });
});
