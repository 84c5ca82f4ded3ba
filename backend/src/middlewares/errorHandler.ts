import type { NextFunction, Request, Response } from 'express';
import errorHandler, { ErrorCode } from '../utils/errorHandler';

export const notFoundHandler = (req: Request, res: Response) => {
  const appError = errorHandler.createError(
    ErrorCode.RESOURCE_NOT_FOUND,
    `Route not found: ${req.method} ${req.path}`,
    undefined,
    `Route not found: ${req.method} ${req.path}`
  );
  req.log?.warn(appError.message);
  res.status(appError.statusCode).json(errorHandler.toEnvelope(appError));
};

// Express recognises error middleware by its four-argument signature
export const errorMiddleware = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const appError = errorHandler.handleError(err, req.id);
  res.status(appError.statusCode).json(errorHandler.toEnvelope(appError));
};
