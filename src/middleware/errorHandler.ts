// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import multer from "multer";

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  // express only treats 4-argument middleware as an error handler
  _next: NextFunction
) {
  // upload limits and rejected file types are the client's fault
  const status = err instanceof multer.MulterError ? 400 : err.statusCode || 500;

  if (status >= 500) {
    console.error(`[ERROR] ${req.method} ${req.url}`, err);
  } else {
    console.warn(`[WARN] ${req.method} ${req.url} -> ${status} ${err.message}`);
  }

  res.status(status).json({
    success: false,
    message: status >= 500 ? "Internal Server Error" : err.message,
    ...(err.code ? { code: err.code } : {}),
    ...(err.details ? { details: err.details } : {}),
  });
}
