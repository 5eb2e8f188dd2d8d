import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { COMMENT_MAX_LENGTH, RATING_MAX, RATING_MIN } from '../domain/reviewGate';
import { requireActor } from '../middlewares/auth';
import { ReviewUpdateInput } from '../repositories/types';
import { CreateReviewInput, ReviewsService } from '../services/reviewsService';
import { formatSuccess } from '../utils/helpers';
import { idParamsSchema, validate } from '../utils/validation';

const rating = Joi.number().integer().min(RATING_MIN).max(RATING_MAX).messages({
  'number.base': 'Rating must be a number',
  'number.integer': 'Rating must be a whole number',
  'number.min': `Rating must be between ${RATING_MIN} and ${RATING_MAX}`,
  'number.max': `Rating must be between ${RATING_MIN} and ${RATING_MAX}`
});

const comment = Joi.string().trim().min(1).max(COMMENT_MAX_LENGTH).messages({
  'string.empty': 'Comment cannot be empty',
  'string.max': `Comment cannot exceed ${COMMENT_MAX_LENGTH} characters`
});

const createReviewSchema = Joi.object<CreateReviewInput>({
  bookingId: Joi.string().uuid().required().messages({
    'string.guid': 'Booking ID must be a valid UUID',
    'any.required': 'Booking ID is required'
  }),
  rating: rating.required(),
  comment: comment.required()
});

const updateReviewSchema = Joi.object<ReviewUpdateInput>({ rating, comment }).min(1).messages({
  'object.min': 'Provide a rating or a comment to update'
});

export const createReviewsController = (reviews: ReviewsService) => ({
  /**
   * Review a completed booking (booking owner, once)
   * POST /api/reviews
   */
  createReview: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const input = validate(createReviewSchema, req.body);
      const review = await reviews.createReview(actor, input);
      res.status(201).json(formatSuccess(review, 'Review created successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Get review by ID (public)
   * GET /api/reviews/:id
   */
  getReview: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validate(idParamsSchema, req.params);
      const review = await reviews.getReview(id);
      res.status(200).json(formatSuccess(review, 'Review retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Update a review (booking owner only)
   * PATCH /api/reviews/:id
   */
  updateReview: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const { id } = validate(idParamsSchema, req.params);
      const input = validate(updateReviewSchema, req.body);
      const review = await reviews.updateReview(actor, id, input);
      res.status(200).json(formatSuccess(review, 'Review updated successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Delete a review (booking owner or admin)
   * DELETE /api/reviews/:id
   */
  deleteReview: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const { id } = validate(idParamsSchema, req.params);
      await reviews.deleteReview(actor, id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  },
});
