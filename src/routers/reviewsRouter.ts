import { RequestHandler, Router } from 'express';
import { createReviewsController } from '../controllers/reviewsController';
import { ReviewsService } from '../services/reviewsService';

/**
 * Reviews Routes
 * Base path: /api/reviews
 */
export const createReviewsRouter = (reviews: ReviewsService, authenticateToken: RequestHandler): Router => {
  const router = Router();
  const controller = createReviewsController(reviews);

  // Public routes
  router.get('/:id', controller.getReview);

  // Protected routes
  router.post('/', authenticateToken, controller.createReview);
  router.patch('/:id', authenticateToken, controller.updateReview);
  router.delete('/:id', authenticateToken, controller.deleteReview);

  return router;
};
