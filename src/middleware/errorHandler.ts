import { Request, Response, NextFunction } from 'express';
import {
  AppError,
  SMSError,
  ServiceError,
  ToolLoopExceededError,
  TurnTimeoutError,
  ValidationError,
} from '../utils/errors';
import { logger } from '../utils/logger';

export const RETRY_LATER_MESSAGE =
  "I'm sorry, I couldn't finish processing that just now. Please try sending your message again in a moment.";

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const status = err instanceof AppError ? err.statusCode : err instanceof ServiceError ? 503 : 500;
  const meta = { error: err.message, path: req.path, method: req.method, status };

  if (status >= 500) {
    logger.error('Request failed', { ...meta, stack: err.stack });
  } else {
    logger.warn('Request rejected', meta);
  }

  if (err instanceof SMSError) {
    return res.status(502).json({ success: false, error: 'SMS provider error' });
  }

  if (err instanceof ToolLoopExceededError || err instanceof TurnTimeoutError) {
    return res.status(503).json({ success: false, error: RETRY_LATER_MESSAGE });
  }

  if (err instanceof ServiceError) {
    return res.status(503).json({ success: false, error: 'Service temporarily unavailable' });
  }

  if (err instanceof ValidationError) {
    return res.status(400).json({ success: false, error: err.message, issues: err.issues });
  }

  if (err instanceof AppError) {
    return res.status(err.statusCode).json({ success: false, error: err.message });
  }

  // Don't leak internal errors in production
  const message = process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message;

  res.status(500).json({ success: false, error: message });
}
