// =====================================================
// Members Controller
// =====================================================
// Self-service endpoints for registered members.

import { Router, Request, Response, NextFunction } from 'express';
import { requireAuth, getAuthenticatedUser, parseRequest } from '../../middleware';
import { sendSuccess } from '../../utils/response';
import { AppServices } from '../../lib/services';
import * as schemas from './members.schemas';

export function createMembersRouter(services: AppServices): Router {
  const router = Router();

  /**
   * POST /api/v1/members/link
   * Links the caller to a group account.
   *
   * Body: { account: 'SomeUser' }
   * Response: 201 when a member was created, 200 when relinked
   */
  router.post('/link', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = getAuthenticatedUser(req);
      const { account } = parseRequest(schemas.linkAccountSchema, req.body);
      const result = await services.members.linkAccount(user.id, account);
      sendSuccess(req, res, result, result.created ? 201 : 200);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/members/me
   * Caller's rank, points and progress. Syncs with the platform first.
   */
  router.get('/me', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = getAuthenticatedUser(req);
      const status = await services.members.getStatus(user.id);
      sendSuccess(req, res, status);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/members/leaderboard?limit=10
   */
  router.get('/leaderboard', requireAuth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { limit } = parseRequest(schemas.leaderboardQuerySchema, req.query);
      const entries = await services.members.leaderboard(limit);
      sendSuccess(req, res, entries);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
