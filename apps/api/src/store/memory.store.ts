// =====================================================
// In-Memory Ledger Store
// =====================================================
// Used for local development without DATABASE_URL and by tests.

import { ERROR_CODES, CreateSubmissionInput, Member, Rank, Submission, SubmissionStatus } from '@rank-ledger/shared-types';
import { ConflictError, NotFoundError } from '../utils/errors';
import { CreateMemberInput, LedgerStore, SubmissionTransition } from './ledger-store';

function cloneMember(member: Member): Member {
  return { ...member, createdAt: new Date(member.createdAt) };
}

function cloneSubmission(submission: Submission): Submission {
  return {
    ...submission,
    participantIds: [...submission.participantIds],
    startTime: new Date(submission.startTime),
    endTime: new Date(submission.endTime),
    createdAt: new Date(submission.createdAt),
  };
}

export class MemoryLedgerStore implements LedgerStore {
  private readonly members = new Map<string, Member>();
  private readonly submissions = new Map<number, Submission>();
  private ranks: Rank[] = [];
  private nextSubmissionId = 1;

  constructor(seed: { members?: Member[]; ranks?: Rank[] } = {}) {
    for (const member of seed.members ?? []) {
      this.members.set(member.externalId, cloneMember(member));
    }
    this.ranks = (seed.ranks ?? []).map((rank) => ({ ...rank }));
  }

  // ---- Members ----

  async getMember(externalId: string): Promise<Member | null> {
    const member = this.members.get(externalId);
    return member ? cloneMember(member) : null;
  }

  async getMemberByAccount(account: string): Promise<Member | null> {
    const needle = account.toLowerCase();
    for (const member of this.members.values()) {
      if (member.externalAccount?.toLowerCase() === needle) {
        return cloneMember(member);
      }
    }
    return null;
  }

  async listMembers(): Promise<Member[]> {
    return [...this.members.values()].map(cloneMember);
  }

  async listTopMembers(limit: number): Promise<Member[]> {
    return [...this.members.values()]
      .sort((a, b) => b.points - a.points)
      .slice(0, limit)
      .map(cloneMember);
  }

  async createMember(input: CreateMemberInput): Promise<Member> {
    if (this.members.has(input.externalId)) {
      throw new ConflictError(`Member ${input.externalId} already exists`);
    }
    this.assertAccountFree(input.externalAccount, input.externalId);

    const member: Member = {
      externalId: input.externalId,
      externalAccount: input.externalAccount,
      rankOrder: input.rankOrder,
      points: 0,
      createdAt: new Date(),
    };
    this.members.set(member.externalId, member);
    return cloneMember(member);
  }

  async updateMemberAccount(externalId: string, account: string): Promise<Member> {
    const member = this.requireMember(externalId);
    this.assertAccountFree(account, externalId);
    member.externalAccount = account;
    return cloneMember(member);
  }

  async setMemberRank(externalId: string, rankOrder: number): Promise<Member> {
    const member = this.requireMember(externalId);
    member.rankOrder = rankOrder;
    return cloneMember(member);
  }

  async addPoints(externalId: string, delta: number): Promise<Member> {
    const member = this.requireMember(externalId);
    member.points += delta;
    return cloneMember(member);
  }

  // ---- Ranks ----

  async getRanks(): Promise<Rank[]> {
    return this.ranks.map((rank) => ({ ...rank }));
  }

  async replaceRanks(ranks: Rank[]): Promise<void> {
    this.ranks = ranks.map((rank) => ({ ...rank }));
  }

  // ---- Submissions ----

  async createSubmission(input: CreateSubmissionInput): Promise<Submission> {
    const submission: Submission = {
      id: this.nextSubmissionId++,
      submitterId: input.submitterId,
      eventType: input.eventType,
      participantIds: [...input.participantIds],
      startTime: new Date(input.startTime),
      endTime: new Date(input.endTime),
      proofReference: input.proofReference,
      status: 'PENDING',
      pointsAwarded: null,
      reviewerId: null,
      createdAt: new Date(),
    };
    this.submissions.set(submission.id, submission);
    return cloneSubmission(submission);
  }

  async getSubmission(id: number): Promise<Submission | null> {
    const submission = this.submissions.get(id);
    return submission ? cloneSubmission(submission) : null;
  }

  async listSubmissions(status: SubmissionStatus): Promise<Submission[]> {
    return [...this.submissions.values()]
      .filter((submission) => submission.status === status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map(cloneSubmission);
  }

  async transitionSubmission(id: number, transition: SubmissionTransition): Promise<Submission | null> {
    const submission = this.submissions.get(id);
    if (!submission || submission.status !== 'PENDING') {
      return null;
    }

    submission.status = transition.status;
    submission.reviewerId = transition.reviewerId;
    submission.pointsAwarded = transition.pointsAwarded;
    return cloneSubmission(submission);
  }

  // ---- Helpers ----

  private requireMember(externalId: string): Member {
    const member = this.members.get(externalId);
    if (!member) {
      throw new NotFoundError(`Member ${externalId} not found`, ERROR_CODES.MEMBER_NOT_FOUND);
    }
    return member;
  }

  private assertAccountFree(account: string, ownerId: string): void {
    const needle = account.toLowerCase();
    for (const member of this.members.values()) {
      if (member.externalId !== ownerId && member.externalAccount?.toLowerCase() === needle) {
        throw new ConflictError(`Account ${account} is already linked to another member`);
      }
    }
  }
}
