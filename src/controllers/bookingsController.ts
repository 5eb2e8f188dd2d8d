import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { BOOKING_STATUSES } from '../domain/bookingStatus';
import { requireActor } from '../middlewares/auth';
import {
  BookingsService,
  CreateBookingInput,
  ListBookingsInput,
  UpdateBookingInput,
} from '../services/bookingsService';
import { formatSuccess } from '../utils/helpers';
import { idParamsSchema, isoDateTime, validate } from '../utils/validation';

// Validation schemas
const createBookingSchema = Joi.object<CreateBookingInput>({
  serviceId: Joi.string().uuid().required().messages({
    'string.guid': 'Service ID must be a valid UUID',
    'any.required': 'Service ID is required'
  }),
  startTime: isoDateTime('Start time').required().messages({
    'any.required': 'Start time is required'
  })
});

const updateBookingSchema = Joi.object<UpdateBookingInput>({
  startTime: isoDateTime('Start time'),
  status: Joi.string().valid(...BOOKING_STATUSES).messages({
    'any.only': `Status must be one of: ${BOOKING_STATUSES.join(', ')}`
  })
}).or('startTime', 'status').messages({
  'object.missing': 'Provide a start time or a status to update'
});

const listBookingsSchema = Joi.object<ListBookingsInput>({
  status: Joi.string().valid(...BOOKING_STATUSES),
  from: isoDateTime('From'),
  to: isoDateTime('To')
});

export const createBookingsController = (bookings: BookingsService) => ({
  /**
   * Create a new booking
   * POST /api/bookings
   */
  createBooking: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const input = validate(createBookingSchema, req.body);
      const booking = await bookings.createBooking(actor, input);
      res.status(201).json(formatSuccess(booking, 'Booking created successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Get bookings (own bookings, or all bookings for admins)
   * GET /api/bookings?status=&from=&to=
   */
  getBookings: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const filter = validate(listBookingsSchema, req.query);
      const bookingsList = await bookings.listBookings(actor, filter);
      res.status(200).json(formatSuccess(bookingsList, 'Bookings retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Get booking by ID (owner or admin)
   * GET /api/bookings/:id
   */
  getBooking: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const { id } = validate(idParamsSchema, req.params);
      const booking = await bookings.getBooking(actor, id);
      res.status(200).json(formatSuccess(booking, 'Booking retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Reschedule or change the status of a booking
   * PATCH /api/bookings/:id
   */
  updateBooking: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const { id } = validate(idParamsSchema, req.params);
      const input = validate(updateBookingSchema, req.body);
      const booking = await bookings.updateBooking(actor, id, input);
      res.status(200).json(formatSuccess(booking, 'Booking updated successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Delete a booking (owner before start time, admin anytime)
   * DELETE /api/bookings/:id
   */
  deleteBooking: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const actor = requireActor(req);
      const { id } = validate(idParamsSchema, req.params);
      await bookings.deleteBooking(actor, id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  },
});
