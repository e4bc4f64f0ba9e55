// =====================================================
// Health Check Routes
// =====================================================

import { Router, Request, Response } from "express";
import { ApiResponse } from "@rank-ledger/shared-types";

const router: Router = Router();

interface HealthStatus {
  status: "healthy";
  timestamp: string;
  uptime: number;
  version: string;
}

// GET /health
router.get("/", (req: Request, res: Response) => {
  const response: ApiResponse<HealthStatus> = {
    success: true,
    data: {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: "0.1.0",
    },
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };

  res.json(response);
});

// GET /health/live (liveness probe)
router.get("/live", (_req: Request, res: Response) => {
  res.status(200).json({ alive: true });
});

export default router;
