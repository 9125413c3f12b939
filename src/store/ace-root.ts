import path from 'node:path';

/**
 * Get the state directory for a given repo path.
 * All persisted core state lives under .ace in the target repo.
 *
 * @param repoPath - The target repository path
 * @returns The absolute path to the state directory (e.g., /path/to/repo/.ace)
 */
export function getAceRoot(repoPath: string): string {
  return path.join(path.resolve(repoPath), '.ace');
}

/** Directory holding one `<run_id>.jsonl` journal per run. */
export function getJournalsDir(repoPath: string): string {
  return path.join(getAceRoot(repoPath), 'journals');
}

export function getJournalPath(repoPath: string, runId: string): string {
  return path.join(getJournalsDir(repoPath), `${runId}.jsonl`);
}

export function getRepairsDir(repoPath: string): string {
  return path.join(getAceRoot(repoPath), 'repairs');
}

export function getLearnPath(repoPath: string): string {
  return path.join(getAceRoot(repoPath), 'learn.json');
}

export function getIndexPath(repoPath: string): string {
  return path.join(getAceRoot(repoPath), 'index.json');
}
