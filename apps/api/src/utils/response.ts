// =====================================================
// Response Envelope
// =====================================================

import { Request, Response } from 'express';
import { ApiResponse } from '@rank-ledger/shared-types';

export function sendSuccess<T>(req: Request, res: Response, data: T, status: number = 200): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };
  res.status(status).json(response);
}
