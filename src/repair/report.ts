import fs from 'node:fs';
import path from 'node:path';
import { repairReportSchema, type RepairReport } from '../types/schemas.js';
import { atomicWriteSync } from '../store/atomic-write.js';
import { stableJson } from '../util/stable-json.js';
import { parseJsonWithSchema } from '../util/json.js';

/**
 * Write a repair report as `<run_id>-<basename>.json` under `dir`.
 * Keys are sorted so reports diff cleanly across runs.
 *
 * @returns path of the written report
 */
export function writeRepairReport(report: RepairReport, dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const reportPath = path.join(dir, `${report.run_id}-${path.basename(report.file)}.json`);
  atomicWriteSync(reportPath, stableJson(report));
  return reportPath;
}

/** Most recently modified valid report in `dir`, or null. */
export function readLatestRepairReport(dir: string): RepairReport | null {
  if (!fs.existsSync(dir)) {
    return null;
  }

  const candidates = fs
    .readdirSync(dir)
    .filter((name) => name.endsWith('.json'))
    .map((name) => {
      const full = path.join(dir, name);
      return { full, mtime: fs.statSync(full).mtimeMs };
    })
    .sort((a, b) => b.mtime - a.mtime || a.full.localeCompare(b.full));

  for (const { full } of candidates) {
    const { data, error } = parseJsonWithSchema(fs.readFileSync(full, 'utf-8'), repairReportSchema);
    if (data) {
      return data;
    }
    console.warn(`[repair] Skipping unreadable report ${full}: ${error ?? 'unknown error'}`);
  }
  return null;
}
