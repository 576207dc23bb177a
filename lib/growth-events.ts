import { z } from 'zod';
import type { GrowthEvent } from '@/types/growth';

const cellSchema = z.union([z.number(), z.string(), z.null()]);

const tableRowSchema = z.object({
  Date: z.string(),
  Age_Days: cellSchema,
  Weight_kg: cellSchema,
});

// Form fields are sent as they stand; missing ones arrive as null
const optionalDateSchema = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));

export const growthEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('add-requested'),
    dateOfBirth: optionalDateSchema,
    measurementDate: optionalDateSchema,
    weightKg: z.number().nullish().transform((value) => value ?? null),
  }),
  z.object({
    type: z.literal('table-saved'),
    rows: z.array(tableRowSchema),
  }),
  z.object({
    type: z.literal('table-edited'),
    rows: z.array(tableRowSchema),
  }),
  z.object({
    type: z.literal('refresh'),
  }),
]);

export type GrowthEventParseResult =
  | { success: true; event: GrowthEvent }
  | { success: false; error: string };

export function parseGrowthEvent(body: unknown): GrowthEventParseResult {
  const parsed = growthEventSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `${path}${issue.message}` };
  }
  return { success: true, event: parsed.data };
}
