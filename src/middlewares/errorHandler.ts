import { NextFunction, Request, Response } from 'express';

function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('type' in err)) {
    return undefined;
  }
  return typeof err.type === 'string' ? err.type : undefined;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const bodyError = bodyParserErrorType(err);
  if (bodyError === 'entity.parse.failed') {
    res.status(400).json({ message: 'Malformed JSON body' });
    return;
  }
  if (bodyError === 'entity.too.large') {
    res.status(413).json({ message: 'Request body too large' });
    return;
  }

  console.error(`[error] ${req.method} ${req.originalUrl}`, err);
  res.status(500).json({ message: 'Internal server error' });
}
