// =====================================================
// Rank Ledger Shared Types
// =====================================================

export * from './api.types';
export * from './rank.types';
export * from './member.types';
export * from './sync.types';
export * from './submission.types';
