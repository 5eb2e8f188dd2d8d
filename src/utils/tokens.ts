import jwt from 'jsonwebtoken';
import Joi from 'joi';
import { Actor, USER_ROLES } from '../domain/actor';
import { UnauthorizedError } from './errors';

export type TokenType = 'access' | 'refresh';

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

export interface TokenSettings {
  secret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

interface TokenClaims {
  sub: string;
  role: Actor['role'];
  type: TokenType;
}

const claimsSchema = Joi.object<TokenClaims>({
  sub: Joi.string().required(),
  role: Joi.string()
    .valid(...USER_ROLES)
    .required(),
  type: Joi.string().valid('access', 'refresh').required(),
}).unknown(true);

const ALGORITHM = 'HS256';

/**
 * Issues and verifies signed, expiring bearer tokens carrying user id and role.
 * Refresh tokens are not single-use; revocation is out of scope.
 */
export const createTokenService = (settings: TokenSettings) => {
  const sign = (actor: Actor, type: TokenType, expiresIn: number): string => {
    const claims: TokenClaims = { sub: actor.userId, role: actor.role, type };
    return jwt.sign(claims, settings.secret, { algorithm: ALGORITHM, expiresIn });
  };

  const verify = (token: string, expected: TokenType): Actor => {
    // Throws JsonWebTokenError / TokenExpiredError, handled by the global error handler
    const decoded = jwt.verify(token, settings.secret, { algorithms: [ALGORITHM] });

    const result = claimsSchema.validate(decoded);
    if (result.error || result.value.type !== expected) {
      throw new UnauthorizedError(`Invalid ${expected} token`, 'INVALID_TOKEN');
    }

    return { userId: result.value.sub, role: result.value.role };
  };

  return {
    issueTokenPair(actor: Actor): TokenPair {
      return {
        accessToken: sign(actor, 'access', settings.accessTokenTtlSeconds),
        refreshToken: sign(actor, 'refresh', settings.refreshTokenTtlSeconds),
        tokenType: 'bearer',
      };
    },
    verifyAccessToken: (token: string): Actor => verify(token, 'access'),
    verifyRefreshToken: (token: string): Actor => verify(token, 'refresh'),
  };
};

export type TokenService = ReturnType<typeof createTokenService>;
