import { Actor } from '../domain/actor';
import { BookingStatus } from '../domain/bookingStatus';
import { canReview, checkReviewEligibility } from '../domain/reviewGate';

const owner: Actor = { userId: 'owner', role: 'user' };
const admin: Actor = { userId: 'admin', role: 'admin' };

const booking = (status: BookingStatus) => ({ userId: 'owner', status });

describe('checkReviewEligibility', () => {
  it('accepts the owner of a completed booking without a review', () => {
    expect(checkReviewEligibility(owner, booking('completed'), false)).toEqual({ eligible: true });
  });

  it.each<BookingStatus>(['pending', 'confirmed', 'cancelled'])('rejects a %s booking', (status) => {
    expect(checkReviewEligibility(owner, booking(status), false)).toEqual({ eligible: false, reason: 'NOT_COMPLETED' });
  });

  it('rejects anyone but the owner, admins included', () => {
    expect(checkReviewEligibility(admin, booking('completed'), false)).toEqual({ eligible: false, reason: 'NOT_OWNER' });
  });

  it('rejects a second review', () => {
    expect(checkReviewEligibility(owner, booking('completed'), true)).toEqual({
      eligible: false,
      reason: 'ALREADY_REVIEWED',
    });
  });
});

describe('canReview', () => {
  it('mirrors the eligibility decision', () => {
    expect(canReview(owner, booking('completed'), false)).toBe(true);
    expect(canReview(owner, booking('completed'), true)).toBe(false);
  });
});
