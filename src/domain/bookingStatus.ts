export const BOOKING_STATUSES = ['pending', 'confirmed', 'completed', 'cancelled'] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

// Bookings in these states hold their time slot
export const ACTIVE_STATUSES: readonly BookingStatus[] = ['pending', 'confirmed'];

export const TERMINAL_STATUSES: readonly BookingStatus[] = ['completed', 'cancelled'];

export const isActiveStatus = (status: BookingStatus): boolean => ACTIVE_STATUSES.includes(status);

export const isTerminalStatus = (status: BookingStatus): boolean => TERMINAL_STATUSES.includes(status);

