import '../types/express';
import { Request, Response, NextFunction } from 'express';
import { Actor } from '../domain/actor';
import { TokenService } from '../utils/tokens';
import { formatError } from '../utils/helpers';
import { UnauthorizedError } from '../utils/errors';

const BEARER_PREFIX = 'Bearer ';

/**
 * Authentication middleware factory.
 * Verifies the bearer access token and attaches the caller as req.user
 */
export const createAuthenticateToken = (tokens: TokenService) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;

    if (!header || !header.startsWith(BEARER_PREFIX)) {
      res.status(401).json(formatError('Authentication required', 'UNAUTHENTICATED'));
      return;
    }

    try {
      req.user = tokens.verifyAccessToken(header.slice(BEARER_PREFIX.length).trim());
      next();
    } catch (error) {
      next(error);
    }
  };
};

/**
 * The authenticated caller; routes mounting this must run authenticateToken first
 */
export const requireActor = (req: Request): Actor => {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
};
