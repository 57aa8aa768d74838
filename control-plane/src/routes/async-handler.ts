import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Forwards a rejected handler promise to the express error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<unknown>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
