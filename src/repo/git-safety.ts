import fs from 'node:fs';
import path from 'node:path';
import { PolicyDenyError } from '../errors.js';
import { git, gitOptional } from './git.js';

export interface GitStatus {
  staged: string[];
  unstaged: string[];
  untracked: string[];
}

export interface GitSafetyOptions {
  /** Skip every check. */
  force?: boolean;
  /** Accept staged or unstaged changes. */
  allowDirty?: boolean;
}

const MAX_LISTED_FILES = 5;

function workDir(target: string): string {
  try {
    return fs.statSync(target).isDirectory() ? target : path.dirname(target);
  } catch {
    return path.dirname(target);
  }
}

export async function isGitRepo(target: string): Promise<boolean> {
  const result = await gitOptional(['rev-parse', '--is-inside-work-tree'], workDir(target));
  return result?.stdout.trim() === 'true';
}

/**
 * Porcelain status split by index / worktree column.
 * A file staged and then modified again appears in both lists.
 */
export async function getGitStatus(target: string): Promise<GitStatus> {
  const result = await git(['status', '--porcelain', '-z'], workDir(target));
  const status: GitStatus = { staged: [], unstaged: [], untracked: [] };

  // -z: "XY path\0", renames add "orig\0" after the entry
  const entries = result.stdout.split('\0').filter((entry) => entry.length > 0);
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry.length < 4 || entry[2] !== ' ') {
      continue;
    }
    const [x, y] = [entry[0], entry[1]];
    const file = entry.slice(3);

    if (x === '?' && y === '?') {
      status.untracked.push(file);
      continue;
    }
    if (x !== ' ') {
      status.staged.push(file);
    }
    if (y !== ' ') {
      status.unstaged.push(file);
    }
    if (x === 'R' || x === 'C') {
      i++;
    }
  }
  return status;
}

/** Non-repositories count as clean. Untracked files only count when `allowUntracked` is false. */
export async function isGitTreeClean(target: string, allowUntracked = true): Promise<boolean> {
  if (!(await isGitRepo(target))) {
    return true;
  }
  const status = await getGitStatus(target);
  if (status.staged.length > 0 || status.unstaged.length > 0) {
    return false;
  }
  return allowUntracked || status.untracked.length === 0;
}

/**
 * Refuse to write into a git tree with uncommitted changes, so every
 * applied edit can also be undone with git.
 *
 * @throws PolicyDenyError when the tree is dirty and neither option is set
 */
export async function checkGitSafety(target: string, options: GitSafetyOptions = {}): Promise<void> {
  if (options.force || options.allowDirty) {
    return;
  }
  if (await isGitTreeClean(target)) {
    return;
  }

  const status = await getGitStatus(target);
  const dirty = [...new Set([...status.staged, ...status.unstaged])];
  const listed = dirty.slice(0, MAX_LISTED_FILES).join(', ');
  const more = dirty.length > MAX_LISTED_FILES ? '...' : '';
  throw new PolicyDenyError(
    `Git working tree has uncommitted changes in ${dirty.length} file(s). ` +
      `Commit changes first or use --force to override. Dirty files: ${listed}${more}`
  );
}
