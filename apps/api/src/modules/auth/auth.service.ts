// =====================================================
// Auth Service
// =====================================================
// Access tokens are HS256 JWTs issued by the bot front end.
// `sub` is the member's external id; `admin: true` marks a
// reviewer. ADMIN_USER_IDS grants the same role by id.

import jwt from 'jsonwebtoken';
import { config } from '../../config';
import { UnauthorizedError } from '../../utils/errors';
import { ERROR_CODES } from '@rank-ledger/shared-types';

// ===========================================
// Types
// ===========================================

export interface AuthenticatedUser {
  id: string;
  isAdmin: boolean;
}

export interface SignAccessTokenOptions {
  admin?: boolean;
  expiresIn?: number; // seconds
  secret?: string;
}

// ===========================================
// Tokens
// ===========================================

export function signAccessToken(memberId: string, options: SignAccessTokenOptions = {}): string {
  const payload: jwt.JwtPayload = { sub: memberId, type: 'access' };
  if (options.admin) {
    payload.admin = true;
  }

  return jwt.sign(payload, options.secret ?? config.jwt.accessSecret, {
    algorithm: 'HS256',
    expiresIn: options.expiresIn ?? 60 * 60,
  });
}

export function isAdminId(memberId: string, adminUserIds: readonly string[] = config.adminUserIds): boolean {
  return adminUserIds.includes(memberId);
}

export function verifyAccessToken(token: string, secret: string = config.jwt.accessSecret): AuthenticatedUser {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new UnauthorizedError('Access token expired', ERROR_CODES.TOKEN_EXPIRED);
    }
    throw new UnauthorizedError('Invalid access token', ERROR_CODES.TOKEN_INVALID);
  }

  if (typeof payload === 'string' || payload.type !== 'access' || !payload.sub) {
    throw new UnauthorizedError('Invalid token type', ERROR_CODES.TOKEN_INVALID);
  }

  return {
    id: payload.sub,
    isAdmin: payload.admin === true || isAdminId(payload.sub),
  };
}
