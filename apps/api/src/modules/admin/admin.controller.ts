// =====================================================
// Admin Controller
// =====================================================
// Reviewer endpoints: member checks, sync, promotion, point
// corrections and submission review. All require an admin token.

import { Router, Request, Response, NextFunction } from 'express';
import { requireAuth, requireAdmin, getAuthenticatedUser, parseRequest } from '../../middleware';
import { validateRequest } from '../../middleware/validation.middleware';
import { sendSuccess } from '../../utils/response';
import { AppServices } from '../../lib/services';
import { approveSubmissionSchema, submissionIdParamSchema } from '../submissions/submissions.schemas';
import * as schemas from './admin.schemas';

export function createAdminRouter(services: AppServices): Router {
  const router = Router();

  router.use(requireAuth, requireAdmin);

  // ===========================================
  // Member Endpoints
  // ===========================================

  /**
   * GET /api/v1/admin/members/:id
   * Status view of any member. Syncs with the platform first.
   */
  router.get(
    '/members/:id',
    validateRequest(schemas.memberIdParamSchema, 'params'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const status = await services.members.getStatus(req.params.id);
        sendSuccess(req, res, status);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/admin/members/:id/sync
   */
  router.post(
    '/members/:id/sync',
    validateRequest(schemas.memberIdParamSchema, 'params'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const outcome = await services.rankSync.syncById(req.params.id);
        sendSuccess(req, res, outcome);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/admin/members/:id/promote
   * Body: { targetOrder?: number }
   * Response: 200 with the promotion result, including any desync
   */
  router.post(
    '/members/:id/promote',
    validateRequest(schemas.memberIdParamSchema, 'params'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const admin = getAuthenticatedUser(req);
        const { targetOrder } = parseRequest(schemas.promoteMemberSchema, req.body ?? {});
        const result = await services.promotions.promote(req.params.id, {
          targetOrder,
          actorId: admin.id,
        });
        sendSuccess(req, res, result);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/admin/members/:id/points
   * Body: { delta: -5 }
   */
  router.post(
    '/members/:id/points',
    validateRequest(schemas.memberIdParamSchema, 'params'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const admin = getAuthenticatedUser(req);
        const { delta } = parseRequest(schemas.adjustPointsSchema, req.body);
        const result = await services.members.adjustPoints(admin.id, req.params.id, delta);
        sendSuccess(req, res, result);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/admin/sync
   * Runs a bulk sync inline and returns its summary.
   */
  router.post('/sync', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const summary = await services.rankSync.bulkSync();
      sendSuccess(req, res, summary);
    } catch (error) {
      next(error);
    }
  });

  // ===========================================
  // Submission Review Endpoints
  // ===========================================

  /**
   * GET /api/v1/admin/submissions/pending
   * Newest first.
   */
  router.get('/submissions/pending', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const pending = await services.submissions.listPending();
      sendSuccess(req, res, pending);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/admin/submissions/:id/approve
   * Body: { points: 1..30 }
   * Response: 200 with per-participant outcomes; reviewing again
   * returns the stored submission with alreadyReviewed: true
   */
  router.post(
    '/submissions/:id/approve',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const admin = getAuthenticatedUser(req);
        const { id } = parseRequest(submissionIdParamSchema, req.params);
        const { points } = parseRequest(approveSubmissionSchema, req.body);
        const result = await services.submissions.approve(id, points, admin.id);
        sendSuccess(req, res, result);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/admin/submissions/:id/decline
   */
  router.post(
    '/submissions/:id/decline',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const admin = getAuthenticatedUser(req);
        const { id } = parseRequest(submissionIdParamSchema, req.params);
        const result = await services.submissions.decline(id, admin.id);
        sendSuccess(req, res, result);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
