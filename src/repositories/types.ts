import { OverlapSource } from '../domain/availability';
import { BookingStatus } from '../domain/bookingStatus';
import {
  Booking,
  BookingWithService,
  NewBooking,
  NewReview,
  NewService,
  NewUser,
  Review,
  Service,
  User,
} from '../db/schema';

export interface UserUpdateInput {
  name?: string;
  email?: string;
}

export interface UserRepository {
  findById(id: string): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  create(input: NewUser): Promise<User>;
  update(id: string, input: UserUpdateInput): Promise<User | undefined>;
}

export interface ServiceFilter {
  q?: string;
  priceMin?: number;
  priceMax?: number;
  active?: boolean;
}

export type ServiceUpdateInput = Partial<Pick<NewService, 'title' | 'description' | 'price' | 'durationMinutes' | 'isActive'>>;

export interface ServiceRepository {
  findById(id: string): Promise<Service | undefined>;
  list(filter: ServiceFilter): Promise<Service[]>;
  create(input: NewService): Promise<Service>;
  update(id: string, input: ServiceUpdateInput): Promise<Service | undefined>;
  delete(id: string): Promise<boolean>;
}

export interface BookingFilter {
  userId?: string;
  status?: BookingStatus;
  from?: Date;
  to?: Date;
}

export type BookingUpdateInput = Partial<Pick<Booking, 'startTime' | 'endTime' | 'status'>>;

export interface BookingRepository extends OverlapSource {
  findById(id: string): Promise<Booking | undefined>;
  findByIdWithService(id: string): Promise<BookingWithService | undefined>;
  list(filter: BookingFilter): Promise<Booking[]>;
  create(input: NewBooking): Promise<Booking>;
  update(id: string, input: BookingUpdateInput): Promise<Booking | undefined>;
  delete(id: string): Promise<boolean>;
}

export type ReviewUpdateInput = Partial<Pick<Review, 'rating' | 'comment'>>;

export interface ReviewRepository {
  findById(id: string): Promise<Review | undefined>;
  findByBookingId(bookingId: string): Promise<Review | undefined>;
  listByServiceId(serviceId: string): Promise<Review[]>;
  create(input: NewReview): Promise<Review>;
  update(id: string, input: ReviewUpdateInput): Promise<Review | undefined>;
  delete(id: string): Promise<boolean>;
}

export interface Repositories {
  users: UserRepository;
  services: ServiceRepository;
  bookings: BookingRepository;
  reviews: ReviewRepository;
}

/**
 * Repositories plus a way to run booking writes for one service atomically.
 * Work passed to `withServiceLock` sees repositories bound to the same unit of work,
 * and no other `withServiceLock` call for that service interleaves with it.
 */
export interface DataStore extends Repositories {
  withServiceLock<T>(serviceId: string, work: (repos: Repositories) => Promise<T>): Promise<T>;
}
