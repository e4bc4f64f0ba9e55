// =====================================================
// Express Application
// =====================================================

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { config } from './config';
import { logger } from './utils/logger';
import { ApiResponse, ERROR_CODES, ErrorCode } from '@rank-ledger/shared-types';
import { AppError } from './utils/errors';
import { AppServices } from './lib/services';
import { requestIdMiddleware } from './middleware';

// Import routes
import healthRoutes from './routes/health.routes';
import { createRanksRouter } from './modules/ranks';
import { createMembersRouter } from './modules/members';
import { createSubmissionsRouter } from './modules/submissions';
import { createAdminRouter } from './modules/admin';

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(services: AppServices): Express {
  const app: Express = express();

  // ===========================================
  // Middleware
  // ===========================================

  // Security headers
  app.use(helmet());

  // CORS configuration
  app.use(cors({
    origin: config.corsOrigins.length > 0 ? [...config.corsOrigins] : '*',
  }));

  app.use(requestIdMiddleware);

  // Parse JSON bodies
  app.use(express.json({ limit: '10kb' }));

  // Compress responses
  app.use(compression());

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} ${res.statusCode} - ${duration}ms`);
    });

    next();
  });

  // ===========================================
  // Routes
  // ===========================================

  // Health check
  app.use('/health', healthRoutes);

  // API v1 routes
  app.use('/api/v1/ranks', createRanksRouter(services));
  app.use('/api/v1/members', createMembersRouter(services));
  app.use('/api/v1/submissions', createSubmissionsRouter(services));
  app.use('/api/v1/admin', createAdminRouter(services));

  // ===========================================
  // Error Handling
  // ===========================================

  // 404 handler
  app.use((req: Request, res: Response) => {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ERROR_CODES.NOT_FOUND,
        message: 'The requested resource was not found',
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };
    res.status(404).json(response);
  });

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    let statusCode = 500;
    let errorCode: ErrorCode = ERROR_CODES.INTERNAL_ERROR;
    let message = config.nodeEnv === 'production' ? 'An unexpected error occurred' : err.message;

    if (err instanceof AppError) {
      statusCode = err.statusCode;
      errorCode = err.code;
      message = err.isOperational ? err.message : message;
    } else if (isBodyParseError(err)) {
      statusCode = 400;
      errorCode = ERROR_CODES.VALIDATION_ERROR;
      message = 'Request body is not valid JSON';
    }

    if (statusCode >= 500) {
      logger.error('Unhandled error:', err);
    } else {
      logger.warn(`${req.method} ${req.path} rejected: ${message}`);
    }

    const response: ApiResponse = {
      success: false,
      error: {
        code: errorCode,
        message,
        details: config.nodeEnv === 'development' && statusCode >= 500 ? err.stack : undefined,
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };

    res.status(statusCode).json(response);
  });

  return app;
}
