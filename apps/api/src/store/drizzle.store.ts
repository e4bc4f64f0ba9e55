// =====================================================
// Postgres Ledger Store
// =====================================================

import { and, desc, eq, sql } from 'drizzle-orm';
import {
  ERROR_CODES,
  CreateSubmissionInput,
  Member,
  Rank,
  Submission,
  SubmissionStatus,
} from '@rank-ledger/shared-types';
import { Database } from '../lib/db';
import { members, ranks, submissions, MemberRow, SubmissionRow } from '../db/schema';
import { ConflictError, NotFoundError } from '../utils/errors';
import { CreateMemberInput, LedgerStore, SubmissionTransition } from './ledger-store';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

function toMember(row: MemberRow): Member {
  return {
    externalId: row.externalId,
    externalAccount: row.externalAccount,
    rankOrder: row.rankOrder,
    points: row.points,
    createdAt: row.createdAt,
  };
}

function toSubmission(row: SubmissionRow): Submission {
  return {
    id: row.id,
    submitterId: row.submitterId,
    eventType: row.eventType,
    participantIds: row.participantIds,
    startTime: row.startTime,
    endTime: row.endTime,
    proofReference: row.proofReference,
    status: row.status,
    pointsAwarded: row.pointsAwarded,
    reviewerId: row.reviewerId,
    createdAt: row.createdAt,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class DrizzleLedgerStore implements LedgerStore {
  constructor(private readonly db: Database) {}

  // ---- Members ----

  async getMember(externalId: string): Promise<Member | null> {
    const [row] = await this.db.select().from(members).where(eq(members.externalId, externalId));
    return row ? toMember(row) : null;
  }

  async getMemberByAccount(account: string): Promise<Member | null> {
    const [row] = await this.db
      .select()
      .from(members)
      .where(eq(members.externalAccountLower, account.toLowerCase()));
    return row ? toMember(row) : null;
  }

  async listMembers(): Promise<Member[]> {
    const rows = await this.db.select().from(members);
    return rows.map(toMember);
  }

  async listTopMembers(limit: number): Promise<Member[]> {
    const rows = await this.db.select().from(members).orderBy(desc(members.points)).limit(limit);
    return rows.map(toMember);
  }

  async createMember(input: CreateMemberInput): Promise<Member> {
    try {
      const [row] = await this.db
        .insert(members)
        .values({
          externalId: input.externalId,
          externalAccount: input.externalAccount,
          externalAccountLower: input.externalAccount.toLowerCase(),
          rankOrder: input.rankOrder,
        })
        .returning();
      return toMember(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Account ${input.externalAccount} is already linked to another member`);
      }
      throw error;
    }
  }

  async updateMemberAccount(externalId: string, account: string): Promise<Member> {
    try {
      const [row] = await this.db
        .update(members)
        .set({ externalAccount: account, externalAccountLower: account.toLowerCase() })
        .where(eq(members.externalId, externalId))
        .returning();
      return this.requireRow(row, externalId);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Account ${account} is already linked to another member`);
      }
      throw error;
    }
  }

  async setMemberRank(externalId: string, rankOrder: number): Promise<Member> {
    const [row] = await this.db
      .update(members)
      .set({ rankOrder })
      .where(eq(members.externalId, externalId))
      .returning();
    return this.requireRow(row, externalId);
  }

  async addPoints(externalId: string, delta: number): Promise<Member> {
    const [row] = await this.db
      .update(members)
      .set({ points: sql`${members.points} + ${delta}` })
      .where(eq(members.externalId, externalId))
      .returning();
    return this.requireRow(row, externalId);
  }

  // ---- Ranks ----

  async getRanks(): Promise<Rank[]> {
    const rows = await this.db.select().from(ranks).orderBy(ranks.order);
    return rows.map((row) => ({ ...row }));
  }

  async replaceRanks(rankList: Rank[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(ranks);
      if (rankList.length > 0) {
        await tx.insert(ranks).values(rankList);
      }
    });
  }

  // ---- Submissions ----

  async createSubmission(input: CreateSubmissionInput): Promise<Submission> {
    const [row] = await this.db
      .insert(submissions)
      .values({
        submitterId: input.submitterId,
        eventType: input.eventType,
        participantIds: input.participantIds,
        startTime: input.startTime,
        endTime: input.endTime,
        proofReference: input.proofReference,
      })
      .returning();
    return toSubmission(row);
  }

  async getSubmission(id: number): Promise<Submission | null> {
    const [row] = await this.db.select().from(submissions).where(eq(submissions.id, id));
    return row ? toSubmission(row) : null;
  }

  async listSubmissions(status: SubmissionStatus): Promise<Submission[]> {
    const rows = await this.db
      .select()
      .from(submissions)
      .where(eq(submissions.status, status))
      .orderBy(desc(submissions.createdAt), desc(submissions.id));
    return rows.map(toSubmission);
  }

  async transitionSubmission(id: number, transition: SubmissionTransition): Promise<Submission | null> {
    const [row] = await this.db
      .update(submissions)
      .set({
        status: transition.status,
        reviewerId: transition.reviewerId,
        pointsAwarded: transition.pointsAwarded,
      })
      .where(and(eq(submissions.id, id), eq(submissions.status, 'PENDING')))
      .returning();
    return row ? toSubmission(row) : null;
  }

  private requireRow(row: MemberRow | undefined, externalId: string): Member {
    if (!row) {
      throw new NotFoundError(`Member ${externalId} not found`, ERROR_CODES.MEMBER_NOT_FOUND);
    }
    return toMember(row);
  }
}
