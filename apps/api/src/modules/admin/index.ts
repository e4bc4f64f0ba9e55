// =====================================================
// Admin Module Exports
// =====================================================

export { createAdminRouter } from './admin.controller';
export * from './admin.schemas';
