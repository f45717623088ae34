import type { Request, Response, NextFunction } from 'express';
import type { AppLogger } from '@/services/logger';
import { errorMessage } from '@/services/errors';

export function createErrorHandler(logger: AppLogger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled HTTP error', { error: errorMessage(err) });
    if (res.headersSent) return;
    res.status(500).json({ success: false, message: 'Internal Server Error', code: 'internal_error' });
  };
}
