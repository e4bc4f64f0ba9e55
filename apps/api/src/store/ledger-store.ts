// =====================================================
// Ledger Store Contract
// =====================================================
// Simple keyed reads and writes. No transaction spans two calls.

import {
  CreateSubmissionInput,
  Member,
  Rank,
  Submission,
  SubmissionStatus,
} from '@rank-ledger/shared-types';

export interface CreateMemberInput {
  externalId: string;
  externalAccount: string;
  rankOrder: number;
}

export interface SubmissionTransition {
  status: Exclude<SubmissionStatus, 'PENDING'>;
  reviewerId: string;
  pointsAwarded: number | null;
}

export interface LedgerStore {
  getMember(externalId: string): Promise<Member | null>;
  // Case-insensitive
  getMemberByAccount(account: string): Promise<Member | null>;
  listMembers(): Promise<Member[]>;
  listTopMembers(limit: number): Promise<Member[]>;
  // ConflictError when the account is linked to another member
  createMember(input: CreateMemberInput): Promise<Member>;
  updateMemberAccount(externalId: string, account: string): Promise<Member>;
  setMemberRank(externalId: string, rankOrder: number): Promise<Member>;
  addPoints(externalId: string, delta: number): Promise<Member>;

  getRanks(): Promise<Rank[]>;
  replaceRanks(ranks: Rank[]): Promise<void>;

  createSubmission(input: CreateSubmissionInput): Promise<Submission>;
  getSubmission(id: number): Promise<Submission | null>;
  // Newest first
  listSubmissions(status: SubmissionStatus): Promise<Submission[]>;
  /**
   * Compare-and-set from PENDING. Returns the updated submission, or
   * null when it was no longer pending (or does not exist).
   */
  transitionSubmission(id: number, transition: SubmissionTransition): Promise<Submission | null>;
}
