import { Booking, BookingWithService } from '../db/schema';
import { Actor, isAdmin } from '../domain/actor';
import { computeEndTime, createAvailabilityChecker } from '../domain/availability';
import { BookingStatus } from '../domain/bookingStatus';
import {
  canView,
  decideDeletion,
  decideReschedule,
  decideStatusChange,
  LifecycleDecision,
} from '../domain/lifecycle';
import { BookingFilter, BookingUpdateInput, DataStore } from '../repositories/types';
import { Clock } from '../utils/clock';
import { ConflictError, ForbiddenError, NotFoundError, PreconditionError, ValidationError } from '../utils/errors';

export interface CreateBookingInput {
  serviceId: string;
  startTime: Date;
}

export interface UpdateBookingInput {
  startTime?: Date;
  status?: BookingStatus;
}

export type ListBookingsInput = Omit<BookingFilter, 'userId'>;

export interface BookingsServiceDeps {
  store: DataStore;
  clock: Clock;
}

/**
 * Turn a rejected lifecycle decision into the error the caller sees
 */
const enforce = (decision: LifecycleDecision, forbiddenMessage: string, transition?: [BookingStatus, BookingStatus]): void => {
  if (decision.allowed) return;

  switch (decision.reason) {
    case 'FORBIDDEN':
      throw new ForbiddenError(forbiddenMessage);
    case 'INVALID_TRANSITION': {
      const detail = transition ? ` from ${transition[0]} to ${transition[1]}` : '';
      throw new PreconditionError(`Cannot change booking status${detail}`, 'INVALID_TRANSITION');
    }
    case 'BOOKING_STARTED':
      throw new PreconditionError('Booking has already started', 'BOOKING_STARTED');
    case 'BOOKING_NOT_ACTIVE':
      throw new PreconditionError('Only pending or confirmed bookings can be changed', 'BOOKING_NOT_ACTIVE');
  }
};

const conflictError = () => new ConflictError('Booking conflict: time slot is not available', 'BOOKING_CONFLICT');

export const createBookingsService = ({ store, clock }: BookingsServiceDeps) => {
  const assertInFuture = (startTime: Date): void => {
    if (startTime.getTime() <= clock().getTime()) {
      throw new ValidationError('Start time must be in the future');
    }
  };

  const findBooking = async (id: string): Promise<Booking> => {
    const booking = await store.bookings.findById(id);
    if (!booking) {
      throw new NotFoundError('Booking not found', 'BOOKING_NOT_FOUND');
    }
    return booking;
  };

  return {
    /**
     * Create a pending booking for the caller.
     * The conflict check and the insert share one service lock.
     */
    async createBooking(actor: Actor, { serviceId, startTime }: CreateBookingInput): Promise<Booking> {
      assertInFuture(startTime);

      const service = await store.services.findById(serviceId);
      if (!service) {
        throw new NotFoundError('Service not found', 'SERVICE_NOT_FOUND');
      }
      if (!service.isActive) {
        throw new PreconditionError('Service is not active', 'SERVICE_INACTIVE');
      }

      const endTime = computeEndTime(startTime, service.durationMinutes);

      return store.withServiceLock(serviceId, async (repos) => {
        const availability = createAvailabilityChecker(repos.bookings);
        if (await availability.hasConflict(serviceId, startTime, endTime)) {
          throw conflictError();
        }

        return repos.bookings.create({
          userId: actor.userId,
          serviceId,
          startTime,
          endTime,
          status: 'pending',
        });
      });
    },

    /**
     * Users see their own bookings, admins see everyone's
     */
    listBookings(actor: Actor, filter: ListBookingsInput): Promise<Booking[]> {
      return store.bookings.list({
        ...filter,
        userId: isAdmin(actor) ? undefined : actor.userId,
      });
    },

    async getBooking(actor: Actor, id: string): Promise<BookingWithService> {
      const booking = await store.bookings.findByIdWithService(id);
      if (!booking) {
        throw new NotFoundError('Booking not found', 'BOOKING_NOT_FOUND');
      }
      if (!canView(actor, booking)) {
        throw new ForbiddenError('Not authorized to access this booking');
      }
      return booking;
    },

    /**
     * Reschedule and/or change status in a single write, checked against the booking
     * as re-read under the service lock. The status rule sees the new start time.
     */
    async updateBooking(actor: Actor, id: string, { startTime, status }: UpdateBookingInput): Promise<Booking> {
      const booking = await findBooking(id);
      if (!canView(actor, booking)) {
        throw new ForbiddenError('Not authorized to update this booking');
      }

      return store.withServiceLock(booking.serviceId, async (repos) => {
        const current = await repos.bookings.findById(id);
        if (!current) {
          throw new NotFoundError('Booking not found', 'BOOKING_NOT_FOUND');
        }

        const now = clock();
        const changes: BookingUpdateInput = {};

        if (startTime) {
          enforce(decideReschedule(actor, current, now), 'Not authorized to reschedule this booking');
          assertInFuture(startTime);

          const service = await repos.services.findById(current.serviceId);
          if (!service) {
            throw new NotFoundError('Service not found', 'SERVICE_NOT_FOUND');
          }
          const endTime = computeEndTime(startTime, service.durationMinutes);

          const availability = createAvailabilityChecker(repos.bookings);
          if (await availability.hasConflict(current.serviceId, startTime, endTime, current.id)) {
            throw conflictError();
          }
          changes.startTime = startTime;
          changes.endTime = endTime;
        }

        if (status) {
          const rescheduled = { ...current, startTime: changes.startTime ?? current.startTime };
          enforce(
            decideStatusChange(actor, rescheduled, status, now),
            'Not authorized to change booking status',
            [current.status, status]
          );
          changes.status = status;
        }

        const updated = await repos.bookings.update(current.id, changes);
        if (!updated) {
          throw new NotFoundError('Booking not found', 'BOOKING_NOT_FOUND');
        }
        return updated;
      });
    },

    /**
     * Hard delete; the booking's review goes with it
     */
    async deleteBooking(actor: Actor, id: string): Promise<void> {
      const booking = await findBooking(id);
      enforce(decideDeletion(actor, booking, clock()), 'Not authorized to delete this booking');
      await store.bookings.delete(booking.id);
    },
  };
};

export type BookingsService = ReturnType<typeof createBookingsService>;
