// src/api/middleware/async-handler.ts
import { NextFunction, Request, RequestHandler, Response } from 'express';

/** Forwards a rejected handler promise to the error middleware. */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
