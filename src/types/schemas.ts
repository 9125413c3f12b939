import { z } from 'zod';

export const severitySchema = z.enum(['critical', 'high', 'medium', 'low', 'info']);

/** A finding produced by an external analyzer. */
export const findingSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().min(0),
  rule: z.string().min(1),
  severity: severitySchema,
  message: z.string(),
  snippet: z.string().optional()
});

export const editOpSchema = z.enum(['replace', 'insert', 'delete']);

/** Line-based edit; lines are 1-based and the range is inclusive. */
export const editSchema = z
  .object({
    file: z.string().min(1),
    start_line: z.number().int().min(1),
    end_line: z.number().int().min(1),
    op: editOpSchema,
    payload: z.string().default('')
  })
  .refine((edit) => edit.end_line >= edit.start_line, {
    message: 'end_line must be >= start_line'
  });

export const editPlanSchema = z.object({
  id: z.string().min(1),
  edits: z.array(editSchema),
  findings: z.array(findingSchema).default([]),
  invariants: z.array(z.string()).default([]),
  estimated_risk: z.number().min(0).max(1)
});

export type Severity = z.infer<typeof severitySchema>;
export type Finding = z.infer<typeof findingSchema>;
export type EditOp = z.infer<typeof editOpSchema>;
export type Edit = Readonly<z.infer<typeof editSchema>>;
export type EditPlan = Readonly<{
  id: string;
  edits: readonly Edit[];
  findings: readonly Finding[];
  invariants: readonly string[];
  estimated_risk: number;
}>;

/** Validate a plan received from a codemod. Throws a ZodError on bad input. */
export function parseEditPlan(input: unknown): EditPlan {
  return editPlanSchema.parse(input);
}

// Guard

export type GuardFailureType = 'parse' | 'ast_equiv' | 'cst_apply' | 'read';
export type GuardType = GuardFailureType | 'all' | 'unguarded';

export interface GuardResult {
  readonly passed: boolean;
  readonly file: string;
  readonly before_content: string;
  readonly after_content: string;
  readonly guard_type: GuardType;
  readonly errors: readonly string[];
}

export interface CheckResult {
  ok: boolean;
  errors: string[];
}

// Repair

export const repairReportSchema = z.object({
  run_id: z.string(),
  file: z.string(),
  total_edits: z.number().int(),
  safe_edits: z.number().int(),
  failed_edits: z.number().int(),
  safe_edit_indices: z.array(z.number().int()),
  failed_edit_indices: z.array(z.number().int()),
  guard_failure_reason: z.string(),
  repair_suggestions: z.array(z.string()).default([]),
  timestamp: z.string().default('')
});

export type RepairReport = z.infer<typeof repairReportSchema>;

// Receipts

export const receiptSchema = z.object({
  plan_id: z.string(),
  file: z.string(),
  before_hash: z.string(),
  after_hash: z.string(),
  parse_valid: z.boolean(),
  invariants_met: z.boolean(),
  estimated_risk: z.number(),
  duration_ms: z.number(),
  timestamp: z.string(),
  policy_hash: z.string().optional()
});

export type Receipt = Readonly<z.infer<typeof receiptSchema>>;

// Policy

export type PolicyDecisionKind = 'auto' | 'suggest' | 'deny';

export interface PolicyThresholds {
  auto: number;
  suggest: number;
}
