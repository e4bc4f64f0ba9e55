// =====================================================
// Ranks Controller
// =====================================================

import { Router, Request, Response } from 'express';
import { sendSuccess } from '../../utils/response';
import { AppServices } from '../../lib/services';

export function createRanksRouter(services: AppServices): Router {
  const router = Router();

  /**
   * GET /api/v1/ranks
   * Point-based and admin-only ranks, in order.
   */
  router.get('/', (req: Request, res: Response): void => {
    sendSuccess(req, res, services.members.listRanks());
  });

  return router;
}
