import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { requireActor } from '../middlewares/auth';
import { UserUpdateInput } from '../repositories/types';
import { UsersService } from '../services/usersService';
import { formatSuccess } from '../utils/helpers';
import { validate } from '../utils/validation';

const updateProfileSchema = Joi.object<UserUpdateInput>({
  name: Joi.string().trim().min(1).max(100).messages({
    'string.max': 'Name cannot exceed 100 characters'
  }),
  email: Joi.string().email().max(255).messages({
    'string.email': 'Please provide a valid email address'
  })
}).min(1).messages({
  'object.min': 'Provide a name or an email to update'
});

export const createUsersController = (users: UsersService) => ({
  /**
   * Get current user profile
   * GET /api/users/me
   */
  getProfile: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = await users.getProfile(requireActor(req));
      res.status(200).json(formatSuccess(user, 'Profile retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Update current user profile
   * PATCH /api/users/me
   */
  updateProfile: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const input = validate(updateProfileSchema, req.body);
      const user = await users.updateProfile(actor, input);
      res.status(200).json(formatSuccess(user, 'Profile updated successfully'));
    } catch (error) {
      next(error);
    }
  },
});
