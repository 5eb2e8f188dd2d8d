import { Actor } from '../domain/actor';
import { BookingStatus } from '../domain/bookingStatus';
import {
  canView,
  decideDeletion,
  decideReschedule,
  decideStatusChange,
  LifecycleBooking,
} from '../domain/lifecycle';

const owner: Actor = { userId: 'owner', role: 'user' };
const stranger: Actor = { userId: 'stranger', role: 'user' };
const admin: Actor = { userId: 'admin', role: 'admin' };

const NOW = new Date('2030-01-15T10:00:00.000Z');
const BEFORE_START = new Date('2030-01-20T13:59:59.000Z');
const AT_START = new Date('2030-01-20T14:00:00.000Z');

const booking = (status: BookingStatus): LifecycleBooking => ({
  userId: 'owner',
  status,
  startTime: new Date('2030-01-20T14:00:00.000Z'),
});

describe('decideStatusChange', () => {
  describe('owner', () => {
    it.each<BookingStatus>(['pending', 'confirmed'])('may cancel a %s booking before it starts', (status) => {
      expect(decideStatusChange(owner, booking(status), 'cancelled', NOW)).toEqual({ allowed: true });
      expect(decideStatusChange(owner, booking(status), 'cancelled', BEFORE_START)).toEqual({ allowed: true });
    });

    it('may not cancel once the start time is reached', () => {
      expect(decideStatusChange(owner, booking('pending'), 'cancelled', AT_START)).toEqual({
        allowed: false,
        reason: 'BOOKING_STARTED',
      });
    });

    it.each<BookingStatus>(['completed', 'cancelled'])('may not cancel a %s booking', (status) => {
      expect(decideStatusChange(owner, booking(status), 'cancelled', NOW)).toEqual({
        allowed: false,
        reason: 'BOOKING_NOT_ACTIVE',
      });
    });

    it.each<BookingStatus>(['pending', 'confirmed', 'completed'])('may not set status to %s', (target) => {
      expect(decideStatusChange(owner, booking('pending'), target, NOW)).toEqual({
        allowed: false,
        reason: 'FORBIDDEN',
      });
    });
  });

  it('forbids a user who does not own the booking', () => {
    expect(decideStatusChange(stranger, booking('pending'), 'cancelled', NOW)).toEqual({
      allowed: false,
      reason: 'FORBIDDEN',
    });
  });

  describe('admin', () => {
    it.each<[BookingStatus, BookingStatus]>([
      ['pending', 'confirmed'],
      ['pending', 'completed'],
      ['pending', 'cancelled'],
      ['confirmed', 'pending'],
      ['confirmed', 'completed'],
      ['confirmed', 'cancelled'],
    ])('may move %s to %s', (from, to) => {
      expect(decideStatusChange(admin, booking(from), to, NOW)).toEqual({ allowed: true });
    });

    it('may act after the start time', () => {
      expect(decideStatusChange(admin, booking('confirmed'), 'completed', AT_START)).toEqual({ allowed: true });
    });

    it.each<[BookingStatus, BookingStatus]>([
      ['completed', 'pending'],
      ['cancelled', 'confirmed'],
      ['pending', 'pending'],
    ])('may not move %s to %s', (from, to) => {
      expect(decideStatusChange(admin, booking(from), to, NOW)).toEqual({
        allowed: false,
        reason: 'INVALID_TRANSITION',
      });
    });
  });
});

describe('decideDeletion', () => {
  it('lets the owner delete before the start time', () => {
    expect(decideDeletion(owner, booking('confirmed'), BEFORE_START)).toEqual({ allowed: true });
  });

  it('stops the owner once the booking has started', () => {
    expect(decideDeletion(owner, booking('confirmed'), AT_START)).toEqual({ allowed: false, reason: 'BOOKING_STARTED' });
  });

  it('lets an admin delete at any time', () => {
    expect(decideDeletion(admin, booking('completed'), AT_START)).toEqual({ allowed: true });
  });

  it('forbids other users', () => {
    expect(decideDeletion(stranger, booking('pending'), NOW)).toEqual({ allowed: false, reason: 'FORBIDDEN' });
  });
});

describe('decideReschedule', () => {
  it('lets the owner move an active booking before it starts', () => {
    expect(decideReschedule(owner, booking('pending'), NOW)).toEqual({ allowed: true });
  });

  it('rejects terminal bookings', () => {
    expect(decideReschedule(owner, booking('cancelled'), NOW)).toEqual({ allowed: false, reason: 'BOOKING_NOT_ACTIVE' });
    expect(decideReschedule(admin, booking('completed'), NOW)).toEqual({ allowed: false, reason: 'BOOKING_NOT_ACTIVE' });
  });

  it('stops the owner after the start time but not an admin', () => {
    expect(decideReschedule(owner, booking('confirmed'), AT_START)).toEqual({ allowed: false, reason: 'BOOKING_STARTED' });
    expect(decideReschedule(admin, booking('confirmed'), AT_START)).toEqual({ allowed: true });
  });

  it('forbids other users', () => {
    expect(decideReschedule(stranger, booking('pending'), NOW)).toEqual({ allowed: false, reason: 'FORBIDDEN' });
  });
});

describe('canView', () => {
  it('allows the owner and admins only', () => {
    expect(canView(owner, booking('pending'))).toBe(true);
    expect(canView(admin, booking('pending'))).toBe(true);
    expect(canView(stranger, booking('pending'))).toBe(false);
  });
});
