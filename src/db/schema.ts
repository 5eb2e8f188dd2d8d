import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  timestamp,
  decimal,
  integer,
  boolean,
  check,
  index,
} from 'drizzle-orm/pg-core';
import { relations, sql } from 'drizzle-orm';
import { BOOKING_STATUSES } from '../domain/bookingStatus';
import { USER_ROLES } from '../domain/actor';

export const userRoleEnum = pgEnum('user_role', USER_ROLES);
export const bookingStatusEnum = pgEnum('booking_status', BOOKING_STATUSES);

// Users table - Accounts with a single role
export const users = pgTable('users', {
  id: uuid('id').defaultRandom().primaryKey(),
  name: varchar('name', { length: 100 }).notNull(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  passwordHash: varchar('password_hash', { length: 255 }).notNull(),
  role: userRoleEnum('role').default('user').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// Services table - Bookable offerings
export const services = pgTable(
  'services',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    title: varchar('title', { length: 200 }).notNull(),
    description: varchar('description', { length: 1000 }).notNull(),
    price: decimal('price', { precision: 10, scale: 2 }).notNull(),
    durationMinutes: integer('duration_minutes').notNull(),
    isActive: boolean('is_active').default(true).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pricePositive: check('services_price_positive', sql`${table.price} > 0`),
    durationPositive: check('services_duration_positive', sql`${table.durationMinutes} > 0`),
    activeIdx: index('services_is_active_idx').on(table.isActive),
  })
);

// Bookings table - A user's reservation of a service for a time range
export const bookings = pgTable(
  'bookings',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    serviceId: uuid('service_id')
      .notNull()
      .references(() => services.id, { onDelete: 'cascade' }),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }).notNull(),
    status: bookingStatusEnum('status').default('pending').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    timeValid: check('bookings_time_valid', sql`${table.endTime} > ${table.startTime}`),
    timeRangeIdx: index('bookings_service_time_range_idx').on(table.serviceId, table.startTime, table.endTime),
    userIdx: index('bookings_user_id_idx').on(table.userId),
    statusIdx: index('bookings_status_idx').on(table.status),
  })
);

// Reviews table - One review per completed booking
export const reviews = pgTable(
  'reviews',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    bookingId: uuid('booking_id')
      .notNull()
      .references(() => bookings.id, { onDelete: 'cascade' })
      .unique(),
    rating: integer('rating').notNull(),
    comment: varchar('comment', { length: 1000 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    ratingRange: check('reviews_rating_range', sql`${table.rating} >= 1 AND ${table.rating} <= 5`),
  })
);

// Define relationships
export const usersRelations = relations(users, ({ many }) => ({
  bookings: many(bookings),
}));

export const servicesRelations = relations(services, ({ many }) => ({
  bookings: many(bookings),
}));

export const bookingsRelations = relations(bookings, ({ one }) => ({
  user: one(users, {
    fields: [bookings.userId],
    references: [users.id],
  }),
  service: one(services, {
    fields: [bookings.serviceId],
    references: [services.id],
  }),
  review: one(reviews),
}));

export const reviewsRelations = relations(reviews, ({ one }) => ({
  booking: one(bookings, {
    fields: [reviews.bookingId],
    references: [bookings.id],
  }),
}));

// Type exports for use in services and repositories
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

export type Service = typeof services.$inferSelect;
export type NewService = typeof services.$inferInsert;

export type Booking = typeof bookings.$inferSelect;
export type NewBooking = typeof bookings.$inferInsert;

export type Review = typeof reviews.$inferSelect;
export type NewReview = typeof reviews.$inferInsert;

// Extended types for API responses
export type PublicUser = Omit<User, 'passwordHash'>;

export type BookingWithService = Booking & {
  service: Service;
};
