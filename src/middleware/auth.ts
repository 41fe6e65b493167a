import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { AuthenticationError } from '../core/errors';

export interface BasicCredentials {
  username: string;
  password: string;
}

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith('Basic ')) return null;

  const decoded = Buffer.from(header.slice(6).trim(), 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator === -1) return null;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * HTTP Basic authentication against a single configured account. Stores the
 * authenticated user name on `res.locals.user`.
 */
export function basicAuth(expected: BasicCredentials) {
  return (req: Request, res: Response, next: NextFunction) => {
    const credentials = parseBasicAuth(req.headers.authorization);

    const valid =
      credentials !== null &&
      safeEqual(credentials.username, expected.username) &&
      safeEqual(credentials.password, expected.password);

    if (!valid) {
      res.setHeader('WWW-Authenticate', 'Basic');
      next(new AuthenticationError('Invalid credentials'));
      return;
    }

    res.locals.user = credentials.username;
    next();
  };
}
