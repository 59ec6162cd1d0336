import { Request, Response, NextFunction, RequestHandler } from "express";
import { config } from "../config/config";
import logger from "../utils/logger";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational = true,
    public code = "APP_ERROR",
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

interface ErrorResponseBody {
  error: string;
  code: string;
  path: string;
  stack?: string;
}

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const code = err instanceof AppError ? err.code : "INTERNAL_ERROR";
  const message = err.message || "Internal Server Error";

  const meta = {
    error: message,
    code,
    path: req.path,
    method: req.method,
    statusCode,
  };
  if (statusCode >= 500) {
    logger.error("Error handler caught exception", { ...meta, stack: err.stack });
  } else {
    logger.warn("Request rejected", meta);
  }

  const response: ErrorResponseBody = {
    error: message,
    code,
    path: req.path,
  };

  if (config.NODE_ENV === "development") {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    code: "ROUTE_NOT_FOUND",
    path: req.path,
  });
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
