import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { AuthService, LoginInput, RegisterInput } from '../services/authService';
import { formatSuccess } from '../utils/helpers';
import { validate } from '../utils/validation';

// Validation schemas
const registerSchema = Joi.object<RegisterInput>({
  name: Joi.string().trim().min(1).max(100).required().messages({
    'string.max': 'Name cannot exceed 100 characters',
    'any.required': 'Name is required'
  }),
  email: Joi.string().email().max(255).required().messages({
    'string.email': 'Please provide a valid email address',
    'any.required': 'Email is required'
  }),
  password: Joi.string().min(8).max(100).required().messages({
    'string.min': 'Password must be at least 8 characters long',
    'any.required': 'Password is required'
  })
});

const loginSchema = Joi.object<LoginInput>({
  email: Joi.string().email().required().messages({
    'string.email': 'Please provide a valid email address',
    'any.required': 'Email is required'
  }),
  password: Joi.string().required().messages({
    'any.required': 'Password is required'
  })
});

const refreshSchema = Joi.object<{ refreshToken: string }>({
  refreshToken: Joi.string().required().messages({
    'any.required': 'Refresh token is required'
  })
});

export const createAuthController = (auth: AuthService) => ({
  /**
   * Register a new user
   * POST /api/auth/register
   */
  register: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = validate(registerSchema, req.body);
      const user = await auth.register(input);
      res.status(201).json(formatSuccess(user, 'User registered successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Login user
   * POST /api/auth/login
   */
  login: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = validate(loginSchema, req.body);
      const tokens = await auth.login(input);
      res.status(200).json(formatSuccess(tokens, 'Login successful'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Exchange a refresh token for a new token pair
   * POST /api/auth/refresh
   */
  refresh: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { refreshToken } = validate(refreshSchema, req.body);
      const tokens = await auth.refresh(refreshToken);
      res.status(200).json(formatSuccess(tokens, 'Token refreshed successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Logout. Tokens are stateless, so the client just discards them
   * POST /api/auth/logout
   */
  logout: (req: Request, res: Response): void => {
    res.status(204).send();
  },
});
