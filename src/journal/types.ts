/**
 * Journal entry schema.
 *
 * One JSON object per line of `.ace/journals/<run_id>.jsonl`, discriminated
 * by `type`. Lifecycle of a run: open → intent* → success* / revert* → close.
 */

import { z } from 'zod';
import { receiptSchema } from '../types/schemas.js';

const sha256Schema = z.string().regex(/^[0-9a-f]{64}$/);

export const intentEntrySchema = z.object({
  type: z.literal('intent'),
  timestamp: z.string(),
  file: z.string(),
  before_sha: sha256Schema,
  before_size: z.number().int().min(0),
  rule_ids: z.array(z.string()),
  plan_id: z.string(),
  // Full original bytes; base64 only when they are not valid UTF-8
  pre_image: z.string(),
  pre_image_encoding: z.enum(['utf-8', 'base64']).optional()
});

export const successEntrySchema = z.object({
  type: z.literal('success'),
  timestamp: z.string(),
  file: z.string(),
  after_sha: sha256Schema,
  after_size: z.number().int().min(0),
  receipt_id: z.string(),
  receipt: receiptSchema.optional()
});

export const revertEntrySchema = z.object({
  type: z.literal('revert'),
  timestamp: z.string(),
  file: z.string(),
  from_sha: z.string(),
  to_sha: z.string(),
  reason: z.string()
});

export const journalEntrySchema = z.discriminatedUnion('type', [
  intentEntrySchema,
  successEntrySchema,
  revertEntrySchema
]);

export type IntentEntry = z.infer<typeof intentEntrySchema>;
export type SuccessEntry = z.infer<typeof successEntrySchema>;
export type RevertEntry = z.infer<typeof revertEntrySchema>;
export type JournalEntry = z.infer<typeof journalEntrySchema>;
export type JournalEntryType = JournalEntry['type'];

/** Everything needed to undo one committed file modification. */
export interface RevertContext {
  file: string;
  /** Hash the file should have now, written by the success entry. */
  expected_current_sha: string;
  /** Hash the file must have once restored. */
  original_sha: string;
  restore_content: Buffer;
  plan_id: string;
  rule_ids: string[];
}
