import { z } from 'zod';

export const DEFAULT_ALPHA = 0.7;
export const DEFAULT_BETA = 0.3;
export const AUTO_THRESHOLD = 0.7;
export const SUGGEST_THRESHOLD = 0.5;

export const ruleModeSchema = z.enum(['auto-fix', 'detect-only']);

const unitInterval = z.number().min(0).max(1);

export const policyConfigSchema = z
  .object({
    alpha: unitInterval.default(DEFAULT_ALPHA),
    beta: unitInterval.default(DEFAULT_BETA),
    auto_threshold: unitInterval.default(AUTO_THRESHOLD),
    suggest_threshold: unitInterval.default(SUGGEST_THRESHOLD),
    // rule_id -> mode
    modes: z.record(ruleModeSchema).default({}),
    suppressions: z
      .object({
        paths: z.array(z.string()).default([]),
        rules: z.record(z.array(z.string())).default({})
      })
      .default({})
  })
  .refine((policy) => policy.auto_threshold >= policy.suggest_threshold, {
    message: 'auto_threshold must be >= suggest_threshold'
  });

export const guardConfigSchema = z.object({
  // Require AST equivalence in addition to parse + round-trip
  strict: z.boolean().default(false)
});

export const indexConfigSchema = z.object({
  deep_scan_threshold: z.number().int().min(1).default(3),
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/dist/**', '**/.git/**'])
});

export const analysisConfigSchema = z.object({
  jobs: z.number().int().min(1).default(4)
});

export const learningConfigSchema = z.object({
  skip_context_threshold: unitInterval.default(0.5)
});

export const gitConfigSchema = z.object({
  require_clean_tree: z.boolean().default(false)
});

export const aceConfigSchema = z.object({
  policy: policyConfigSchema.default({}),
  guard: guardConfigSchema.default({}),
  index: indexConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  learning: learningConfigSchema.default({}),
  git: gitConfigSchema.default({})
});

export type RuleMode = z.infer<typeof ruleModeSchema>;
export type PolicyConfig = z.infer<typeof policyConfigSchema>;
export type AceConfig = z.infer<typeof aceConfigSchema>;

export function defaultConfig(): AceConfig {
  return aceConfigSchema.parse({});
}
