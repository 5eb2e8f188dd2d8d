import { and, desc, eq, gt, gte, inArray, lt, lte, SQL } from 'drizzle-orm';
import { bookings } from '../db/schema';
import { ACTIVE_STATUSES } from '../domain/bookingStatus';
import { Executor } from './executor';
import { BookingFilter, BookingRepository } from './types';

const buildConditions = ({ userId, status, from, to }: BookingFilter): SQL[] => {
  const conditions: SQL[] = [];
  if (userId) conditions.push(eq(bookings.userId, userId));
  if (status) conditions.push(eq(bookings.status, status));
  if (from) conditions.push(gte(bookings.startTime, from));
  if (to) conditions.push(lte(bookings.startTime, to));
  return conditions;
};

export const createBookingRepository = (db: Executor): BookingRepository => ({
  async findById(id) {
    const results = await db.select().from(bookings).where(eq(bookings.id, id));
    return results[0];
  },

  async findByIdWithService(id) {
    return db.query.bookings.findFirst({
      where: eq(bookings.id, id),
      with: { service: true },
    });
  },

  async list(filter) {
    return db
      .select()
      .from(bookings)
      .where(and(...buildConditions(filter)))
      .orderBy(desc(bookings.startTime));
  },

  async findActiveOverlapping(serviceId, range) {
    return db
      .select({ id: bookings.id })
      .from(bookings)
      .where(
        and(
          eq(bookings.serviceId, serviceId),
          inArray(bookings.status, [...ACTIVE_STATUSES]),
          lt(bookings.startTime, range.end),
          gt(bookings.endTime, range.start)
        )
      );
  },

  async create(input) {
    const inserted = await db.insert(bookings).values(input).returning();
    const booking = inserted[0];
    if (!booking) {
      throw new Error('Failed to create booking');
    }
    return booking;
  },

  async update(id, input) {
    const updated = await db
      .update(bookings)
      .set({ ...input, updatedAt: new Date() })
      .where(eq(bookings.id, id))
      .returning();
    return updated[0];
  },

  async delete(id) {
    const deleted = await db.delete(bookings).where(eq(bookings.id, id)).returning({ id: bookings.id });
    return deleted.length > 0;
  },
});
