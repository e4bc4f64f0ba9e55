// =====================================================
// Submission Validation Schemas
// =====================================================

import { z } from 'zod';
import { config } from '../../config';

export const createSubmissionSchema = z.object({
  eventType: z.string().trim().min(1, 'Event type is required').max(100),
  participantIds: z
    .array(z.string().trim().min(1))
    .min(1, 'At least one participant is required')
    .max(50, 'At most 50 participants per submission'),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  proofReference: z.string().trim().min(1, 'Proof is required').max(500),
});

export const approveSubmissionSchema = z.object({
  points: z
    .number()
    .int('Points must be a whole number')
    .min(config.submissions.minPoints)
    .max(config.submissions.maxPoints),
});

export const submissionIdParamSchema = z.object({
  id: z.coerce.number().int().positive('Invalid submission ID'),
});

export type CreateSubmissionBody = z.infer<typeof createSubmissionSchema>;
export type ApproveSubmissionInput = z.infer<typeof approveSubmissionSchema>;
