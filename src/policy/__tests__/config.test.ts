import { describe, it, expect } from 'vitest';
import { defaultConfig, type PolicyConfig } from '../../config/schema.js';
import { getMode, isSuppressed, policyHash } from '../config.js';

function policyWith(overrides: Partial<PolicyConfig>): PolicyConfig {
  return { ...defaultConfig().policy, ...overrides };
}

describe('isSuppressed', () => {
  it('suppresses nothing by default', () => {
    expect(isSuppressed(defaultConfig().policy, 'src/a.ts', 'R1')).toBe(false);
  });

  it('matches global path patterns', () => {
    const policy = policyWith({ suppressions: { paths: ['**/generated/**'], rules: {} } });
    expect(isSuppressed(policy, 'src/generated/api.ts', 'R1')).toBe(true);
    expect(isSuppressed(policy, 'src/api.ts', 'R1')).toBe(false);
  });

  it('falls back to the file name', () => {
    const policy = policyWith({ suppressions: { paths: ['*.d.ts'], rules: {} } });
    expect(isSuppressed(policy, 'src/types/global.d.ts', 'R1')).toBe(true);
    expect(isSuppressed(policy, 'src\\types\\global.d.ts', 'R1')).toBe(true);
  });

  it('scopes rule patterns to their rule', () => {
    const policy = policyWith({ suppressions: { paths: [], rules: { R1: ['legacy/**'] } } });
    expect(isSuppressed(policy, 'legacy/old.ts', 'R1')).toBe(true);
    expect(isSuppressed(policy, 'legacy/old.ts', 'R2')).toBe(false);
  });
});

describe('getMode', () => {
  it('defaults to auto-fix', () => {
    const policy = policyWith({ modes: { R2: 'detect-only' } });
    expect(getMode(policy, 'R1')).toBe('auto-fix');
    expect(getMode(policy, 'R2')).toBe('detect-only');
  });
});

describe('policyHash', () => {
  it('ignores suppression order', () => {
    const a = policyWith({ suppressions: { paths: ['a/**', 'b/**'], rules: { R1: ['x', 'y'] } } });
    const b = policyWith({ suppressions: { paths: ['b/**', 'a/**'], rules: { R1: ['y', 'x'] } } });
    expect(policyHash(a)).toMatch(/^[0-9a-f]{16}$/);
    expect(policyHash(a)).toBe(policyHash(b));
  });

  it('changes with thresholds', () => {
    expect(policyHash(policyWith({ auto_threshold: 0.8 }))).not.toBe(policyHash(defaultConfig().policy));
  });
});
