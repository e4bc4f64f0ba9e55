// =====================================================
// Members Validation Schemas
// =====================================================

import { z } from 'zod';
import { LEADERBOARD_DEFAULT_LIMIT, LEADERBOARD_MAX_LIMIT } from './members.service';

// Platform usernames: 3-20 characters, letters, digits and one underscore
export const linkAccountSchema = z.object({
  account: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(20, 'Username must be at most 20 characters')
    .regex(/^[A-Za-z0-9]+(_[A-Za-z0-9]+)?$/, 'Username may only contain letters, digits and one underscore'),
});

export const leaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(LEADERBOARD_MAX_LIMIT).default(LEADERBOARD_DEFAULT_LIMIT),
});

export type LinkAccountInput = z.infer<typeof linkAccountSchema>;
export type LeaderboardQuery = z.infer<typeof leaderboardQuerySchema>;
