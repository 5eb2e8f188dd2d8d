export interface TimeRange {
  start: Date;
  end: Date;
}

const MINUTE_MS = 60_000;

/**
 * End of a booking that starts at `start` and lasts `durationMinutes`
 */
export const computeEndTime = (start: Date, durationMinutes: number): Date => {
  return new Date(start.getTime() + durationMinutes * MINUTE_MS);
};

/**
 * Half-open interval overlap: [a.start, a.end) against [b.start, b.end).
 * Covers exact match, partial overlap on either side and containment;
 * ranges that only touch at a boundary do not overlap.
 */
export const rangesOverlap = (a: TimeRange, b: TimeRange): boolean => {
  return a.start.getTime() < b.end.getTime() && a.end.getTime() > b.start.getTime();
};

export const isValidRange = (range: TimeRange): boolean => range.end.getTime() > range.start.getTime();

/**
 * Looks up active bookings of a service that overlap a range.
 * Implemented by the bookings repository against whatever storage backs it.
 */
export interface OverlapSource {
  findActiveOverlapping(serviceId: string, range: TimeRange): Promise<Array<{ id: string }>>;
}

export interface AvailabilityChecker {
  hasConflict(serviceId: string, startTime: Date, endTime: Date, excludeBookingId?: string): Promise<boolean>;
}

export const createAvailabilityChecker = (source: OverlapSource): AvailabilityChecker => ({
  async hasConflict(serviceId, startTime, endTime, excludeBookingId) {
    const range = { start: startTime, end: endTime };
    if (!isValidRange(range)) {
      throw new RangeError('End time must be after start time');
    }

    const overlapping = await source.findActiveOverlapping(serviceId, range);
    return overlapping.some(booking => booking.id !== excludeBookingId);
  },
});
