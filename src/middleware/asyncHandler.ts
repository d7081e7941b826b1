// src/middleware/asyncHandler.ts
import { Request, Response, NextFunction, RequestHandler } from "express";

// Forwards thrown errors and rejected promises to the error middleware
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => unknown): RequestHandler =>
  (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
