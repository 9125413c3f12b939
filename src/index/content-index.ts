/**
 * Content index for incremental scanning.
 *
 * Tracks size, sha256 and a clean-run counter per file so repeated runs can
 * skip files that have not changed, and stop deep-scanning files that have
 * stayed clean for several consecutive passes.
 *
 * Persists to: .ace/index.json as {entries: {<absolute path>: {...}}}
 */

import fs from 'node:fs';
import path from 'node:path';
import picomatch from 'picomatch';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { sha256Hex } from '../util/hash.js';
import { stableJson } from '../util/stable-json.js';
import { atomicWriteSync } from '../store/atomic-write.js';

export interface IndexEntry {
  path: string;
  size: number;
  sha256: string;
  clean_runs_count: number;
}

export interface IndexStats {
  total_files: number;
  total_size: number;
  clean_files: number;
}

const storedEntrySchema = z.object({
  size: z.number().int().min(0),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  clean_runs_count: z.number().int().min(0).default(0)
});

const indexDocumentSchema = z.object({
  entries: z.record(storedEntrySchema)
});

const MAX_INDEXABLE_BYTES = 10 * 1024 * 1024;

const BINARY_EXTENSIONS = new Set([
  '.pyc', '.pyo', '.so', '.dylib', '.dll', '.exe', '.bin', '.o', '.a', '.wasm',
  '.jpg', '.jpeg', '.png', '.gif', '.webp', '.ico', '.pdf',
  '.zip', '.tar', '.gz', '.bz2', '.xz', '.7z'
]);

export class ContentIndex {
  readonly indexPath: string;
  private entries = new Map<string, IndexEntry>();

  constructor(indexPath: string) {
    this.indexPath = indexPath;
  }

  /**
   * Hash the file and store its entry.
   *
   * With `preserveCleanRuns`, the clean-run counter survives only if the
   * content hash is unchanged; any content change resets it to 0.
   */
  addFile(filePath: string, preserveCleanRuns = false): IndexEntry {
    const key = path.resolve(filePath);
    const content = fs.readFileSync(key);
    const sha256 = sha256Hex(content);

    const previous = this.entries.get(key);
    const keepCount = preserveCleanRuns && previous !== undefined && previous.sha256 === sha256;

    const entry: IndexEntry = {
      path: key,
      size: content.length,
      sha256,
      clean_runs_count: keepCount ? previous.clean_runs_count : 0
    };
    this.entries.set(key, entry);
    return { ...entry };
  }

  /** True if the file is new, deleted, unreadable or its content differs. Never mutates. */
  hasChanged(filePath: string): boolean {
    const key = path.resolve(filePath);
    const entry = this.entries.get(key);
    if (!entry) {
      return true;
    }

    let stat: fs.Stats;
    try {
      stat = fs.statSync(key);
    } catch {
      return true;
    }
    if (!stat.isFile() || stat.size !== entry.size) {
      return true;
    }

    try {
      return sha256Hex(fs.readFileSync(key)) !== entry.sha256;
    } catch {
      return true;
    }
  }

  getEntry(filePath: string): IndexEntry | undefined {
    const entry = this.entries.get(path.resolve(filePath));
    return entry ? { ...entry } : undefined;
  }

  /** Untracked paths are ignored. */
  incrementCleanRuns(filePath: string): void {
    const entry = this.entries.get(path.resolve(filePath));
    if (entry) {
      entry.clean_runs_count += 1;
    }
  }

  resetCleanRuns(filePath: string): void {
    const entry = this.entries.get(path.resolve(filePath));
    if (entry) {
      entry.clean_runs_count = 0;
    }
  }

  shouldSkipDeepScan(filePath: string, threshold: number): boolean {
    const entry = this.entries.get(path.resolve(filePath));
    return entry !== undefined && entry.clean_runs_count >= threshold;
  }

  getChangedFiles(files: readonly string[]): string[] {
    return files.filter((file) => this.hasChanged(file));
  }

  /** Drop every entry and index `files` from scratch. Unreadable files are skipped. */
  rebuild(files: readonly string[]): void {
    this.entries.clear();
    for (const file of files) {
      try {
        this.addFile(file);
      } catch (err) {
        console.warn(`[index] Skipping unreadable file ${file}: ${errorMessage(err)}`);
      }
    }
  }

  removeFile(filePath: string): void {
    this.entries.delete(path.resolve(filePath));
  }

  getStats(): IndexStats {
    let totalSize = 0;
    let cleanFiles = 0;
    for (const entry of this.entries.values()) {
      totalSize += entry.size;
      if (entry.clean_runs_count > 0) {
        cleanFiles += 1;
      }
    }
    return {
      total_files: this.entries.size,
      total_size: totalSize,
      clean_files: cleanFiles
    };
  }

  /** Write-temp-then-rename, so a failed save leaves the previous index intact. */
  save(): void {
    const entries: Record<string, Omit<IndexEntry, 'path'>> = {};
    for (const [key, entry] of this.entries) {
      entries[key] = {
        size: entry.size,
        sha256: entry.sha256,
        clean_runs_count: entry.clean_runs_count
      };
    }
    atomicWriteSync(this.indexPath, stableJson({ entries }));
  }

  /** Missing index → empty. Corrupt index → logged, then empty. */
  load(): void {
    this.entries.clear();
    if (!fs.existsSync(this.indexPath)) {
      return;
    }

    let parsed: z.infer<typeof indexDocumentSchema>;
    try {
      const raw = fs.readFileSync(this.indexPath, 'utf-8');
      const result = indexDocumentSchema.safeParse(JSON.parse(raw));
      if (!result.success) {
        console.warn(`[index] Ignoring invalid index ${this.indexPath}: ${result.error.issues[0]?.message ?? 'schema mismatch'}`);
        return;
      }
      parsed = result.data;
    } catch (err) {
      console.warn(`[index] Ignoring corrupted index ${this.indexPath}: ${errorMessage(err)}`);
      return;
    }

    for (const [key, stored] of Object.entries(parsed.entries)) {
      this.entries.set(key, { path: key, ...stored });
    }
  }
}

export function computeFileHash(filePath: string): string {
  return sha256Hex(fs.readFileSync(filePath));
}

/**
 * Whether a file belongs in the index: not hidden, not a known binary
 * extension, not larger than 10 MiB, and not matched by `exclude` globs.
 * With `root`, globs match the path relative to it.
 */
export function isIndexable(filePath: string, exclude: readonly string[] = [], root?: string): boolean {
  const base = path.basename(filePath);
  if (base.startsWith('.')) {
    return false;
  }
  if (BINARY_EXTENSIONS.has(path.extname(base).toLowerCase())) {
    return false;
  }
  if (exclude.length > 0) {
    const target = root === undefined ? filePath : path.relative(root, path.resolve(filePath));
    const normalized = target.replace(/\\/g, '/');
    const isExcluded = picomatch([...exclude], { dot: true });
    if (isExcluded(normalized)) {
      return false;
    }
  }
  if (fs.existsSync(filePath)) {
    try {
      if (fs.statSync(filePath).size > MAX_INDEXABLE_BYTES) {
        return false;
      }
    } catch {
      return false;
    }
  }
  return true;
}
