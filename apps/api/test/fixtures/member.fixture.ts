// =====================================================
// Member & Submission Fixtures
// =====================================================

import { CreateSubmissionInput, Member } from '@rank-ledger/shared-types';

export function createTestMember(overrides: Partial<Member> = {}): Member {
  return {
    externalId: 'member-1',
    externalAccount: 'PlayerOne',
    rankOrder: 1,
    points: 0,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function createTestSubmissionInput(
  overrides: Partial<CreateSubmissionInput> = {}
): CreateSubmissionInput {
  return {
    submitterId: 'member-1',
    eventType: 'Training',
    participantIds: ['member-1'],
    startTime: new Date('2026-02-01T18:00:00.000Z'),
    endTime: new Date('2026-02-01T19:00:00.000Z'),
    proofReference: 'https://example.com/proof/1.png',
    ...overrides,
  };
}
