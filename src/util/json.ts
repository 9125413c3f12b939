import type { z } from 'zod';

export function parseJsonWithSchema<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { data?: T; error?: string } {
  try {
    const parsed = JSON.parse(raw) as unknown;
    const result = schema.safeParse(parsed);
    if (!result.success) {
      return { error: result.error.message };
    }
    return { data: result.data };
  } catch (error) {
    return { error: error instanceof Error ? error.message : 'Invalid JSON' };
  }
}
