/**
 * Centralized Error Handling Middleware
 * Provides consistent error responses across all endpoints
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { logger } from "../lib/logger";
import { AppNotFoundError, AppValidationError, BaseAppError, toAppError } from "../../shared/errors";

function isMalformedJson(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Express error handling middleware
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  // Skip if response already sent
  if (res.headersSent) {
    return next(err);
  }

  const appError: BaseAppError = isMalformedJson(err)
    ? new AppValidationError(`Malformed JSON body: ${err.message}`, "body", ["json"])
    : toAppError(err, `${req.method} ${req.path}`);

  const logContext = {
    error: appError.code,
    message: appError.message,
    statusCode: appError.statusCode,
    path: req.path,
    method: req.method,
    details: appError.details,
    stack: err instanceof Error ? err.stack : undefined,
  };
  if (appError.statusCode >= 500) {
    logger.error(logContext, "Request error handled");
  } else {
    logger.warn(logContext, "Request rejected");
  }

  res.status(appError.statusCode).json({
    success: false,
    error: appError.code,
    message: appError.message,
    timestamp: appError.timestamp,
    ...(appError.details && { details: appError.details }),
  });
};

/**
 * Catch-all middleware for unhandled routes
 */
export const notFoundHandler = (req: Request, res: Response) => {
  const error = AppNotFoundError.resourceNotFound(`Route ${req.path}`);

  logger.warn({ path: req.path, method: req.method }, "Route not found");

  res.status(error.statusCode).json({
    success: false,
    error: error.code,
    message: error.message,
    timestamp: error.timestamp,
  });
};

/**
 * Async error wrapper for route handlers
 * Usage: router.post('/path', asyncHandler(async (req, res) => { ... }))
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};
