import { Actor, isOwner } from './actor';
import { BookingStatus } from './bookingStatus';

export type ReviewRejection = 'NOT_OWNER' | 'NOT_COMPLETED' | 'ALREADY_REVIEWED';

export type ReviewEligibility = { eligible: true } | { eligible: false; reason: ReviewRejection };

export const RATING_MIN = 1;
export const RATING_MAX = 5;
export const COMMENT_MAX_LENGTH = 1000;

/**
 * Only the owner of a completed booking may review it, once.
 * The unique index on reviews.booking_id remains the final guard against races.
 */
export const checkReviewEligibility = (
  actor: Actor,
  booking: { userId: string; status: BookingStatus },
  hasExistingReview: boolean
): ReviewEligibility => {
  if (!isOwner(actor, booking)) {
    return { eligible: false, reason: 'NOT_OWNER' };
  }
  if (booking.status !== 'completed') {
    return { eligible: false, reason: 'NOT_COMPLETED' };
  }
  if (hasExistingReview) {
    return { eligible: false, reason: 'ALREADY_REVIEWED' };
  }
  return { eligible: true };
};

export const canReview = (
  actor: Actor,
  booking: { userId: string; status: BookingStatus },
  hasExistingReview: boolean
): boolean => checkReviewEligibility(actor, booking, hasExistingReview).eligible;
