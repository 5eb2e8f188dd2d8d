import '../types/express';
import { Request, Response, NextFunction } from 'express';
import { UserRole } from '../domain/actor';
import { formatError } from '../utils/helpers';

/**
 * Role-based Access Control Middleware
 * This is a higher-order function that creates middleware to check if user has one of the required roles
 */
export const hasRole = (requiredRoles: UserRole[]) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Check if user is authenticated first
    if (!req.user) {
      res.status(401).json(formatError('Authentication required', 'UNAUTHENTICATED'));
      return;
    }

    if (!requiredRoles.includes(req.user.role)) {
      res.status(403).json(
        formatError(
          `Access denied. Required roles: ${requiredRoles.join(' or ')}`,
          'INSUFFICIENT_PERMISSIONS'
        )
      );
      return;
    }

    next();
  };
};
