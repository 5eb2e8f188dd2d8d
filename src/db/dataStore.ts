import { eq } from 'drizzle-orm';
import { Database } from './connectDB';
import { services } from './schema';
import { Executor } from '../repositories/executor';
import { createUserRepository } from '../repositories/usersRepository';
import { createServiceRepository } from '../repositories/servicesRepository';
import { createBookingRepository } from '../repositories/bookingsRepository';
import { createReviewRepository } from '../repositories/reviewsRepository';
import { DataStore, Repositories } from '../repositories/types';

const createRepositories = (executor: Executor): Repositories => ({
  users: createUserRepository(executor),
  services: createServiceRepository(executor),
  bookings: createBookingRepository(executor),
  reviews: createReviewRepository(executor),
});

/**
 * Postgres-backed store.
 * `withServiceLock` opens a transaction and takes a row lock on the service, so two
 * requests booking the same service run their conflict check and write one after the other.
 */
export const createDrizzleDataStore = (db: Database): DataStore => ({
  ...createRepositories(db),

  withServiceLock(serviceId, work) {
    return db.transaction(async (tx) => {
      await tx.select({ id: services.id }).from(services).where(eq(services.id, serviceId)).for('update');
      return work(createRepositories(tx));
    });
  },
});
