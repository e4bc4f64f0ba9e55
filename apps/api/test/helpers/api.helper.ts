// =====================================================
// API Helper for Tests
// =====================================================

import { Express } from 'express';
import { createApp } from '../../src/app';
import { signAccessToken } from '../../src/modules/auth/auth.service';
import { TestContext } from './context';

export function createTestApp(context: TestContext): Express {
  return createApp(context.services);
}

export function authHeader(memberId: string, options: { admin?: boolean } = {}): string {
  return `Bearer ${signAccessToken(memberId, { admin: options.admin, secret: 'test-secret' })}`;
}
