import { desc, eq } from 'drizzle-orm';
import { bookings, reviews } from '../db/schema';
import { Executor } from './executor';
import { ReviewRepository } from './types';

export const createReviewRepository = (db: Executor): ReviewRepository => ({
  async findById(id) {
    const results = await db.select().from(reviews).where(eq(reviews.id, id));
    return results[0];
  },

  async findByBookingId(bookingId) {
    const results = await db.select().from(reviews).where(eq(reviews.bookingId, bookingId));
    return results[0];
  },

  async listByServiceId(serviceId) {
    const rows = await db
      .select({ review: reviews })
      .from(reviews)
      .innerJoin(bookings, eq(reviews.bookingId, bookings.id))
      .where(eq(bookings.serviceId, serviceId))
      .orderBy(desc(reviews.createdAt));
    return rows.map(row => row.review);
  },

  async create(input) {
    const inserted = await db.insert(reviews).values(input).returning();
    const review = inserted[0];
    if (!review) {
      throw new Error('Failed to create review');
    }
    return review;
  },

  async update(id, input) {
    const updated = await db
      .update(reviews)
      .set({ ...input, updatedAt: new Date() })
      .where(eq(reviews.id, id))
      .returning();
    return updated[0];
  },

  async delete(id) {
    const deleted = await db.delete(reviews).where(eq(reviews.id, id)).returning({ id: reviews.id });
    return deleted.length > 0;
  },
});
