// =====================================================
// Admin Validation Schemas
// =====================================================

import { z } from 'zod';

export const memberIdParamSchema = z.object({
  id: z.string().trim().min(1, 'Member id is required').max(64),
});

export const promoteMemberSchema = z.object({
  // Omitted: next rank by order, admin-only ranks included
  targetOrder: z.number().int().min(1).optional(),
});

export const adjustPointsSchema = z.object({
  delta: z
    .number()
    .int('Delta must be a whole number')
    .refine((v) => v !== 0, 'Delta cannot be zero'),
});

export type PromoteMemberInput = z.infer<typeof promoteMemberSchema>;
export type AdjustPointsInput = z.infer<typeof adjustPointsSchema>;
