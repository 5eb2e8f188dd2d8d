import { RequestHandler, Router } from 'express';
import { createBookingsController } from '../controllers/bookingsController';
import { BookingsService } from '../services/bookingsService';

/**
 * Bookings Routes
 * Base path: /api/bookings
 */
export const createBookingsRouter = (bookings: BookingsService, authenticateToken: RequestHandler): Router => {
  const router = Router();
  const controller = createBookingsController(bookings);

  // All booking routes require authentication
  router.use(authenticateToken);

  router.post('/', controller.createBooking);
  router.get('/', controller.getBookings);
  router.get('/:id', controller.getBooking);
  router.patch('/:id', controller.updateBooking);
  router.delete('/:id', controller.deleteBooking);

  return router;
};
