/**
 * Parallel analysis with a deterministic merge.
 *
 * Workers only read files and call the analyzer; the content index is read
 * before the pool starts and written after it finishes, on the caller's
 * path. Findings are merged in (file, line, rule, message) order, so the
 * output is the same for any number of workers.
 */

import fs from 'node:fs';
import type { Finding } from '../types/schemas.js';
import { isIndexable, type ContentIndex } from '../index/content-index.js';
import { defaultConfig, type AceConfig } from '../config/schema.js';
import { errorMessage } from '../errors.js';

/** External rule engine: findings for one file. */
export type Analyzer = (filePath: string, content: string) => Promise<readonly Finding[]> | readonly Finding[];

export interface AnalysisOptions {
  files: readonly string[];
  analyzer: Analyzer;
  /** Source of `analysis.jobs`, `index.deep_scan_threshold` and `index.exclude`. */
  config?: AceConfig;
  /** Base for matching exclude globs; defaults to the working directory. */
  root?: string;
  /** Concurrent analyzer calls. Overrides `analysis.jobs`. */
  jobs?: number;
  index?: ContentIndex;
  /** Clean runs after which an unchanged file is no longer analyzed. Overrides `index.deep_scan_threshold`. */
  deepScanThreshold?: number;
}

export interface AnalysisError {
  file: string;
  message: string;
}

export interface AnalysisResult {
  findings: Finding[];
  analyzed: string[];
  skipped: string[];
  /** Files rejected by `isIndexable`, never read. */
  excluded: string[];
  errors: AnalysisError[];
}

type FileOutcome = { file: string; findings: readonly Finding[] } | { file: string; error: string };

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareStrings(a.file, b.file) ||
    a.line - b.line ||
    compareStrings(a.rule, b.rule) ||
    compareStrings(a.message, b.message)
  );
}

/** Findings in merge order; the input is not mutated. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

async function analyzeFile(file: string, analyzer: Analyzer): Promise<FileOutcome> {
  try {
    const content = await fs.promises.readFile(file, 'utf-8');
    return { file, findings: await analyzer(file, content) };
  } catch (err) {
    return { file, error: errorMessage(err) };
  }
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const current = next++;
      results[current] = await worker(items[current]);
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}

export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisResult> {
  const { analyzer, index } = options;
  const config = options.config ?? defaultConfig();
  const jobs = options.jobs ?? config.analysis.jobs;
  const threshold = options.deepScanThreshold ?? config.index.deep_scan_threshold;
  const root = options.root ?? process.cwd();
  const files = [...new Set(options.files)].sort(compareStrings);

  const skipped: string[] = [];
  const excluded: string[] = [];
  const pending: string[] = [];
  for (const file of files) {
    if (!isIndexable(file, config.index.exclude, root)) {
      excluded.push(file);
    } else if (index && !index.hasChanged(file) && index.shouldSkipDeepScan(file, threshold)) {
      skipped.push(file);
    } else {
      pending.push(file);
    }
  }

  const outcomes = await mapWithConcurrency(pending, jobs, (file) => analyzeFile(file, analyzer));

  const findings: Finding[] = [];
  const analyzed: string[] = [];
  const errors: AnalysisError[] = [];
  for (const outcome of outcomes) {
    if ('error' in outcome) {
      errors.push({ file: outcome.file, message: outcome.error });
      continue;
    }
    analyzed.push(outcome.file);
    findings.push(...outcome.findings);

    if (index) {
      if (index.hasChanged(outcome.file)) {
        index.addFile(outcome.file, true);
      }
      if (outcome.findings.length === 0) {
        index.incrementCleanRuns(outcome.file);
      } else {
        index.resetCleanRuns(outcome.file);
      }
    }
  }

  return { findings: sortFindings(findings), analyzed, skipped, excluded, errors };
}
