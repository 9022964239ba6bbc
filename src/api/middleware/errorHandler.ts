import { Request, Response, NextFunction } from 'express';
import { ChainTimeoutError, LaunchpadError, UnknownLaunchError, isLaunchpadError } from '../../types/errors';
import { logger } from '../../utils/logger';

export function statusFor(error: LaunchpadError): number {
  if (error instanceof UnknownLaunchError) return 404;
  if (error instanceof ChainTimeoutError) return 504;

  switch (error.errorClass) {
    case 'VALIDATION':
    case 'SLIPPAGE':
      return 400;
    case 'AUTHORIZATION':
      return 403;
    case 'STATE':
    case 'CONSISTENCY':
      return 409;
    case 'ARITHMETIC':
      return 422;
    case 'NETWORK':
      return 502;
  }
}

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  if (isLaunchpadError(err)) {
    const status = statusFor(err);
    if (status >= 500 || err.errorClass === 'ARITHMETIC') {
      logger.error(`API ${req.method} ${req.path} failed`, { code: err.code, error: err.message });
    } else {
      logger.debug(`API ${req.method} ${req.path} rejected`, { code: err.code, error: err.message });
    }

    res.status(status).json({
      success: false,
      error: { code: err.code, message: err.message },
      timestamp: new Date()
    });
    return;
  }

  if (err instanceof SyntaxError) {
    res.status(400).json({
      success: false,
      error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
      timestamp: new Date()
    });
    return;
  }

  logger.error('API Error', { error: err.message, stack: err.stack });

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An error occurred',
      details: process.env.NODE_ENV === 'development' ? err.message : undefined
    },
    timestamp: new Date()
  });
};
