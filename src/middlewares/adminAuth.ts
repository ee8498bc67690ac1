import { NextFunction, Request, Response } from 'express';
import { randomBytes, timingSafeEqual } from 'node:crypto';
import { env } from '../config/env';

let generatedToken: string | null = null;

/** ADMIN_TOKEN when configured, otherwise a random token generated once per process. */
export function getAdminToken(): string {
  if (env.ADMIN_TOKEN) {
    return env.ADMIN_TOKEN;
  }
  if (!generatedToken) {
    generatedToken = randomBytes(16).toString('hex');
  }
  return generatedToken;
}

export function isAdminTokenGenerated(): boolean {
  return !env.ADMIN_TOKEN;
}

function extractToken(req: Request): string | undefined {
  const authorization = req.headers.authorization;
  if (authorization) {
    const [scheme, token] = authorization.split(' ');
    return scheme === 'Bearer' && token ? token : undefined;
  }
  return typeof req.query.token === 'string' ? req.query.token : undefined;
}

export function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireAdminToken(req: Request, res: Response, next: NextFunction): void {
  const token = extractToken(req);

  if (!token) {
    res.status(401).json({ message: 'Missing admin token' });
    return;
  }

  if (!tokensMatch(token, getAdminToken())) {
    res.status(401).json({ message: 'Invalid admin token' });
    return;
  }

  next();
}
