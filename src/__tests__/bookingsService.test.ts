import { Service, User } from '../db/schema';
import { createBookingsService } from '../services/bookingsService';
import { ConflictError, PreconditionError } from '../utils/errors';
import { createMemoryDataStore } from './support/memoryDataStore';
import { NOW, seedBooking, seedService, seedUser } from './support/testApp';

const reasonOf = (result: PromiseSettledResult<unknown>): unknown =>
  result.status === 'rejected' ? result.reason : undefined;

describe('bookingsService under concurrent calls', () => {
  let store: ReturnType<typeof createMemoryDataStore>;
  let bookings: ReturnType<typeof createBookingsService>;
  let owner: User;
  let other: User;
  let service: Service;

  beforeEach(async () => {
    store = createMemoryDataStore();
    bookings = createBookingsService({ store, clock: () => NOW });
    owner = await seedUser(store, { email: 'owner@example.com' });
    other = await seedUser(store, { email: 'other@example.com' });
    service = await seedService(store);
  });

  it('creates only one of two overlapping bookings started together', async () => {
    const results = await Promise.allSettled([
      bookings.createBooking({ userId: owner.id, role: 'user' }, { serviceId: service.id, startTime: new Date('2030-01-20T14:00:00.000Z') }),
      bookings.createBooking({ userId: other.id, role: 'user' }, { serviceId: service.id, startTime: new Date('2030-01-20T14:30:00.000Z') }),
    ]);

    expect(results.map(result => result.status)).toEqual(['fulfilled', 'rejected']);
    expect(reasonOf(results[1])).toBeInstanceOf(ConflictError);
    expect(store.tables.bookings.size).toBe(1);
  });

  it('creates both bookings when their slots only touch', async () => {
    const results = await Promise.allSettled([
      bookings.createBooking({ userId: owner.id, role: 'user' }, { serviceId: service.id, startTime: new Date('2030-01-20T14:00:00.000Z') }),
      bookings.createBooking({ userId: other.id, role: 'user' }, { serviceId: service.id, startTime: new Date('2030-01-20T15:00:00.000Z') }),
    ]);

    expect(results.map(result => result.status)).toEqual(['fulfilled', 'fulfilled']);
    expect(store.tables.bookings.size).toBe(2);
  });

  it('refuses to reschedule a booking cancelled while the reschedule was waiting', async () => {
    const booking = await seedBooking(store, { user: owner, service, start: '2030-01-20T14:00:00.000Z' });
    const actor = { userId: owner.id, role: 'user' } as const;

    const [cancel, reschedule] = await Promise.allSettled([
      bookings.updateBooking(actor, booking.id, { status: 'cancelled' }),
      bookings.updateBooking(actor, booking.id, { startTime: new Date('2030-01-21T09:00:00.000Z') }),
    ]);

    expect(cancel.status).toBe('fulfilled');
    expect(reasonOf(reschedule)).toBeInstanceOf(PreconditionError);
    expect(reasonOf(reschedule)).toMatchObject({ code: 'BOOKING_NOT_ACTIVE' });

    const stored = store.tables.bookings.get(booking.id);
    expect(stored?.status).toBe('cancelled');
    expect(stored?.startTime.toISOString()).toBe('2030-01-20T14:00:00.000Z');
  });
});
