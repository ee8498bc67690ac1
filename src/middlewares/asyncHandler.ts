import { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forwards a rejected handler promise to the Express error handler. */
export function asyncHandler(handler: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
