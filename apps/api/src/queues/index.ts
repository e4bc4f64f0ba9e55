// =====================================================
// Queue Module Exports
// =====================================================

export * from './connection';
export * from './rank-sync.queue';
