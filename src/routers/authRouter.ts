import { Router } from 'express';
import { createAuthController } from '../controllers/authController';
import { AuthService } from '../services/authService';

/**
 * Authentication Routes
 * Base path: /api/auth
 */
export const createAuthRouter = (auth: AuthService): Router => {
  const router = Router();
  const controller = createAuthController(auth);

  // Public routes
  router.post('/register', controller.register);
  router.post('/login', controller.login);
  router.post('/refresh', controller.refresh);
  router.post('/logout', controller.logout);

  return router;
};
