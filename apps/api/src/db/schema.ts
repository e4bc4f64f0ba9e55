// =====================================================
// Database Schema (Postgres)
// =====================================================

import { pgTable, text, serial, integer, boolean, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

export const members = pgTable(
  'members',
  {
    externalId: text('external_id').primaryKey(),
    // Stored lowercased copy is indexed for case-insensitive lookups
    externalAccount: text('external_account'),
    externalAccountLower: text('external_account_lower').unique(),
    rankOrder: integer('rank_order').notNull().default(1),
    points: integer('points').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pointsIdx: index('members_points_idx').on(table.points),
  })
);

export const ranks = pgTable('ranks', {
  order: integer('rank_order').primaryKey(),
  name: text('name').notNull(),
  pointsRequired: integer('points_required').notNull(),
  externalRankRef: integer('external_rank_ref').notNull(),
  adminOnly: boolean('admin_only').notNull().default(false),
});

export const submissions = pgTable(
  'submissions',
  {
    id: serial('id').primaryKey(),
    submitterId: text('submitter_id').notNull(),
    eventType: text('event_type').notNull(),
    participantIds: jsonb('participant_ids').$type<string[]>().notNull(),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }).notNull(),
    proofReference: text('proof_reference').notNull(),
    status: text('status', { enum: ['PENDING', 'APPROVED', 'DECLINED'] }).notNull().default('PENDING'),
    pointsAwarded: integer('points_awarded'),
    reviewerId: text('reviewer_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    statusIdx: index('submissions_status_idx').on(table.status),
  })
);

export type MemberRow = typeof members.$inferSelect;
export type SubmissionRow = typeof submissions.$inferSelect;
