import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ServiceFilter } from '../repositories/types';
import { CreateServiceInput, ServiceCatalog, UpdateServiceInput } from '../services/serviceCatalog';
import { formatSuccess } from '../utils/helpers';
import { idParamsSchema, validate } from '../utils/validation';

// Validation schemas
const serviceFields = {
  title: Joi.string().trim().min(1).max(200).messages({
    'string.max': 'Service title cannot exceed 200 characters',
  }),
  description: Joi.string().trim().min(1).max(1000).messages({
    'string.max': 'Description cannot exceed 1000 characters',
  }),
  price: Joi.number().positive().precision(2).messages({
    'number.positive': 'Price must be a positive number',
  }),
  durationMinutes: Joi.number().integer().positive().messages({
    'number.positive': 'Duration must be a positive number',
  }),
  isActive: Joi.boolean(),
};

const createServiceSchema = Joi.object<CreateServiceInput>({
  title: serviceFields.title.required(),
  description: serviceFields.description.required(),
  price: serviceFields.price.required(),
  durationMinutes: serviceFields.durationMinutes.required(),
  isActive: serviceFields.isActive.default(true),
});

const updateServiceSchema = Joi.object<UpdateServiceInput>(serviceFields).min(1).messages({
  'object.min': 'Provide at least one field to update',
});

const listServicesSchema = Joi.object<ServiceFilter>({
  q: Joi.string().trim().max(200),
  priceMin: Joi.number().min(0),
  priceMax: Joi.number().min(0),
  active: Joi.boolean(),
});

export const createServicesController = (catalog: ServiceCatalog) => ({
  /**
   * Get all services
   * GET /api/services?q=&priceMin=&priceMax=&active=
   */
  getServices: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filter = validate(listServicesSchema, req.query);
      const servicesList = await catalog.listServices(filter);
      res.status(200).json(formatSuccess(servicesList, 'Services retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Get service by ID
   * GET /api/services/:id
   */
  getService: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validate(idParamsSchema, req.params);
      const service = await catalog.getService(id);
      res.status(200).json(formatSuccess(service, 'Service retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Create a new service (Admin only)
   * POST /api/services
   */
  createService: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = validate(createServiceSchema, req.body);
      const service = await catalog.createService(input);
      res.status(201).json(formatSuccess(service, 'Service created successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Update a service (Admin only)
   * PATCH /api/services/:id
   */
  updateService: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validate(idParamsSchema, req.params);
      const input = validate(updateServiceSchema, req.body);
      const service = await catalog.updateService(id, input);
      res.status(200).json(formatSuccess(service, 'Service updated successfully'));
    } catch (error) {
      next(error);
    }
  },

  /**
   * Delete a service and its bookings (Admin only)
   * DELETE /api/services/:id
   */
  deleteService: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validate(idParamsSchema, req.params);
      await catalog.deleteService(id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  },

  /**
   * Reviews left on a service's bookings
   * GET /api/services/:id/reviews
   */
  getServiceReviews: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = validate(idParamsSchema, req.params);
      const reviews = await catalog.listServiceReviews(id);
      res.status(200).json(formatSuccess(reviews, 'Reviews retrieved successfully'));
    } catch (error) {
      next(error);
    }
  },
});
