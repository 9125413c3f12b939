import path from 'node:path';
import picomatch from 'picomatch';
import type { PolicyConfig, RuleMode } from '../config/schema.js';
import { sha256Hex } from '../util/hash.js';
import { stableStringify } from '../util/stable-json.js';

function toPosix(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

// A pattern matches the whole path or, failing that, just the file name
function matchesAny(filePath: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) {
    return false;
  }
  const isMatch = picomatch([...patterns], { dot: true });
  const normalized = toPosix(filePath);
  return isMatch(normalized) || isMatch(path.posix.basename(normalized));
}

/** Whether findings of `ruleId` in `filePath` are suppressed globally or per rule. */
export function isSuppressed(policy: PolicyConfig, filePath: string, ruleId: string): boolean {
  if (matchesAny(filePath, policy.suppressions.paths)) {
    return true;
  }
  return matchesAny(filePath, policy.suppressions.rules[ruleId] ?? []);
}

/** Rules without an explicit mode are auto-fix. */
export function getMode(policy: PolicyConfig, ruleId: string): RuleMode {
  return policy.modes[ruleId] ?? 'auto-fix';
}

/**
 * Fingerprint of a policy: first 16 hex chars of the sha256 of its
 * sorted-key JSON, with suppression lists sorted. Stamped on receipts so an
 * applied change can be traced to the policy that allowed it.
 */
export function policyHash(policy: PolicyConfig): string {
  const rules: Record<string, string[]> = {};
  for (const [ruleId, patterns] of Object.entries(policy.suppressions.rules)) {
    rules[ruleId] = [...patterns].sort();
  }
  const normalized = {
    ...policy,
    suppressions: { paths: [...policy.suppressions.paths].sort(), rules }
  };
  return sha256Hex(stableStringify(normalized)).slice(0, 16);
}
