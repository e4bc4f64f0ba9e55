// =====================================================
// Submissions Controller
// =====================================================
// Member-facing submission endpoint. Review lives under /admin.

import { Router, Request, Response, NextFunction } from 'express';
import { requireAuth, getAuthenticatedUser, parseRequest } from '../../middleware';
import { createSubmissionRateLimiter } from '../../middleware/rate-limit.middleware';
import { sendSuccess } from '../../utils/response';
import { AppServices } from '../../lib/services';
import * as schemas from './submissions.schemas';

export function createSubmissionsRouter(services: AppServices): Router {
  const router = Router();

  /**
   * POST /api/v1/submissions
   * Submits an activity for review.
   *
   * Body: { eventType, participantIds, startTime, endTime, proofReference }
   * Response: 201 with the pending submission
   */
  router.post(
    '/',
    requireAuth,
    createSubmissionRateLimiter(),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const user = getAuthenticatedUser(req);
        const body = parseRequest(schemas.createSubmissionSchema, req.body);
        const submission = await services.submissions.create({ ...body, submitterId: user.id });
        sendSuccess(req, res, submission, 201);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
