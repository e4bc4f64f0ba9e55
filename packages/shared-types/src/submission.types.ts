// =====================================================
// Activity Submission Types
// =====================================================

import type { PromotionResult } from './sync.types';

export type SubmissionStatus = 'PENDING' | 'APPROVED' | 'DECLINED';

export interface Submission {
  id: number;
  submitterId: string;
  eventType: string;
  participantIds: string[];
  startTime: Date;
  endTime: Date;
  proofReference: string;
  status: SubmissionStatus;
  pointsAwarded: number | null;
  reviewerId: string | null;
  createdAt: Date;
}

export interface CreateSubmissionInput {
  submitterId: string;
  eventType: string;
  participantIds: string[];
  startTime: Date;
  endTime: Date;
  proofReference: string;
}

export type ParticipantAwardStatus = 'AWARDED' | 'MEMBER_NOT_FOUND' | 'FAILED';

export interface ParticipantAwardOutcome {
  participantId: string;
  status: ParticipantAwardStatus;
  pointsAfter: number | null;
  promotion: PromotionResult | null;
  error: string | null;
}

export interface ReviewResult {
  submission: Submission;
  // true when the submission was already terminal and nothing was changed
  alreadyReviewed: boolean;
  participants: ParticipantAwardOutcome[];
}
