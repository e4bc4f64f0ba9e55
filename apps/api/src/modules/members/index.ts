// =====================================================
// Members Module Exports
// =====================================================

export { createMembersRouter } from './members.controller';
export { MembersService } from './members.service';
export * from './members.schemas';
