// =====================================================
// External Collaborator Contracts
// =====================================================
// All implementations raise RateLimitedError for 429s and
// ExternalServiceError for every other upstream failure.

import { ExternalRankDescriptor, Member, Rank, Submission } from '@rank-ledger/shared-types';

/**
 * The external group platform: source of truth for rank identity.
 */
export interface ExternalRankPlatform {
  readonly providerName: string;
  fetchRank(account: string): Promise<ExternalRankDescriptor>;
  pushRank(account: string, rankRef: number): Promise<void>;
}

/**
 * The locally visible badge/role representing a rank.
 */
export interface GrantProvider {
  grant(member: Member, rank: Rank): Promise<void>;
  revoke(member: Member, rank: Rank): Promise<void>;
}

/**
 * Best-effort member notifications. Callers never let a failure here
 * change the outcome of the operation being reported.
 */
export interface MemberNotifier {
  notifyPromotion(member: Member, rank: Rank): Promise<void>;
  notifyPointsAwarded(member: Member, points: number, submissionId: number | null): Promise<void>;
  notifySubmissionDeclined(submission: Submission, reviewerId: string): Promise<void>;
}

/**
 * Operator-facing presentation of a pending submission.
 */
export interface SubmissionPresenter {
  presentSubmission(submission: Submission): Promise<void>;
}

export class NoopGrantProvider implements GrantProvider {
  async grant(): Promise<void> {}
  async revoke(): Promise<void> {}
}

export class NoopNotifier implements MemberNotifier {
  async notifyPromotion(): Promise<void> {}
  async notifyPointsAwarded(): Promise<void> {}
  async notifySubmissionDeclined(): Promise<void> {}
}

export class NoopSubmissionPresenter implements SubmissionPresenter {
  async presentSubmission(): Promise<void> {}
}
