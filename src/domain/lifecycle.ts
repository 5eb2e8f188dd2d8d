import { Actor, isAdmin, isOwner } from './actor';
import { BookingStatus, isActiveStatus, isTerminalStatus } from './bookingStatus';

export interface LifecycleBooking {
  userId: string;
  status: BookingStatus;
  startTime: Date;
}

export type LifecycleRejection =
  | 'FORBIDDEN'
  | 'INVALID_TRANSITION'
  | 'BOOKING_STARTED'
  | 'BOOKING_NOT_ACTIVE';

export type LifecycleDecision = { allowed: true } | { allowed: false; reason: LifecycleRejection };

const allow: LifecycleDecision = { allowed: true };
const reject = (reason: LifecycleRejection): LifecycleDecision => ({ allowed: false, reason });

const hasStarted = (booking: LifecycleBooking, now: Date): boolean =>
  booking.startTime.getTime() <= now.getTime();

/**
 * Decide whether `actor` may move `booking` to `target` at time `now`.
 *
 * Admins may move a non-terminal booking to any other status.
 * Owners may only cancel an active booking, and only before it starts.
 */
export const decideStatusChange = (
  actor: Actor,
  booking: LifecycleBooking,
  target: BookingStatus,
  now: Date
): LifecycleDecision => {
  if (isAdmin(actor)) {
    if (isTerminalStatus(booking.status) || booking.status === target) {
      return reject('INVALID_TRANSITION');
    }
    return allow;
  }

  if (!isOwner(actor, booking) || target !== 'cancelled') {
    return reject('FORBIDDEN');
  }
  if (!isActiveStatus(booking.status)) {
    return reject('BOOKING_NOT_ACTIVE');
  }
  if (hasStarted(booking, now)) {
    return reject('BOOKING_STARTED');
  }
  return allow;
};

/**
 * Owners may delete before the start time, admins at any time
 */
export const decideDeletion = (actor: Actor, booking: LifecycleBooking, now: Date): LifecycleDecision => {
  if (isAdmin(actor)) return allow;
  if (!isOwner(actor, booking)) return reject('FORBIDDEN');
  if (hasStarted(booking, now)) return reject('BOOKING_STARTED');
  return allow;
};

export const decideReschedule = (actor: Actor, booking: LifecycleBooking, now: Date): LifecycleDecision => {
  const admin = isAdmin(actor);
  if (!admin && !isOwner(actor, booking)) return reject('FORBIDDEN');
  if (!isActiveStatus(booking.status)) return reject('BOOKING_NOT_ACTIVE');
  if (!admin && hasStarted(booking, now)) return reject('BOOKING_STARTED');
  return allow;
};

export const canView = (actor: Actor, booking: { userId: string }): boolean =>
  isAdmin(actor) || isOwner(actor, booking);
