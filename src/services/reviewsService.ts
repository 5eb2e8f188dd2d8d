import { Review } from '../db/schema';
import { Actor, isAdmin, isOwner } from '../domain/actor';
import { checkReviewEligibility } from '../domain/reviewGate';
import { BookingRepository, ReviewRepository, ReviewUpdateInput } from '../repositories/types';
import {
  ConflictError,
  ForbiddenError,
  isUniqueViolation,
  NotFoundError,
  PreconditionError,
} from '../utils/errors';

export interface CreateReviewInput {
  bookingId: string;
  rating: number;
  comment: string;
}

const reviewExists = () => new ConflictError('Review already exists for this booking', 'REVIEW_EXISTS');

export const createReviewsService = (bookings: BookingRepository, reviews: ReviewRepository) => {
  const findReview = async (id: string): Promise<Review> => {
    const review = await reviews.findById(id);
    if (!review) {
      throw new NotFoundError('Review not found', 'REVIEW_NOT_FOUND');
    }
    return review;
  };

  // Every review has a booking (FK, cascade delete)
  const findParentBooking = async (review: Review) => {
    const booking = await bookings.findById(review.bookingId);
    if (!booking) {
      throw new NotFoundError('Booking not found', 'BOOKING_NOT_FOUND');
    }
    return booking;
  };

  return {
    async createReview(actor: Actor, { bookingId, rating, comment }: CreateReviewInput): Promise<Review> {
      const booking = await bookings.findById(bookingId);
      if (!booking) {
        throw new NotFoundError('Booking not found', 'BOOKING_NOT_FOUND');
      }

      const existing = await reviews.findByBookingId(bookingId);
      const eligibility = checkReviewEligibility(actor, booking, existing !== undefined);

      if (!eligibility.eligible) {
        switch (eligibility.reason) {
          case 'NOT_OWNER':
            throw new ForbiddenError('Can only review your own bookings');
          case 'NOT_COMPLETED':
            throw new PreconditionError('Can only review completed bookings', 'BOOKING_NOT_COMPLETED');
          case 'ALREADY_REVIEWED':
            throw reviewExists();
        }
      }

      try {
        return await reviews.create({ bookingId, rating, comment });
      } catch (error) {
        // Lost a race with a concurrent review of the same booking
        if (isUniqueViolation(error)) {
          throw reviewExists();
        }
        throw error;
      }
    },

    getReview: findReview,

    async updateReview(actor: Actor, id: string, input: ReviewUpdateInput): Promise<Review> {
      const review = await findReview(id);
      const booking = await findParentBooking(review);

      if (!isOwner(actor, booking)) {
        throw new ForbiddenError('Not authorized to update this review');
      }

      const updated = await reviews.update(id, input);
      if (!updated) {
        throw new NotFoundError('Review not found', 'REVIEW_NOT_FOUND');
      }
      return updated;
    },

    async deleteReview(actor: Actor, id: string): Promise<void> {
      const review = await findReview(id);
      const booking = await findParentBooking(review);

      if (!isOwner(actor, booking) && !isAdmin(actor)) {
        throw new ForbiddenError('Not authorized to delete this review');
      }

      await reviews.delete(id);
    },
  };
};

export type ReviewsService = ReturnType<typeof createReviewsService>;
