import { RequestHandler, Router } from 'express';
import { createUsersController } from '../controllers/usersController';
import { UsersService } from '../services/usersService';

/**
 * User Routes
 * Base path: /api/users
 */
export const createUsersRouter = (users: UsersService, authenticateToken: RequestHandler): Router => {
  const router = Router();
  const controller = createUsersController(users);

  router.use(authenticateToken);

  router.get('/me', controller.getProfile);
  router.patch('/me', controller.updateProfile);

  return router;
};
