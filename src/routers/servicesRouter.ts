import { RequestHandler, Router } from 'express';
import { createServicesController } from '../controllers/servicesController';
import { hasRole } from '../middlewares/roleAuth';
import { ServiceCatalog } from '../services/serviceCatalog';

/**
 * Services Routes
 * Base path: /api/services
 */
export const createServicesRouter = (catalog: ServiceCatalog, authenticateToken: RequestHandler): Router => {
  const router = Router();
  const controller = createServicesController(catalog);

  // Public routes
  router.get('/', controller.getServices);
  router.get('/:id', controller.getService);
  router.get('/:id/reviews', controller.getServiceReviews);

  // Protected routes - require authentication and admin role
  router.post('/', authenticateToken, hasRole(['admin']), controller.createService);
  router.patch('/:id', authenticateToken, hasRole(['admin']), controller.updateService);
  router.delete('/:id', authenticateToken, hasRole(['admin']), controller.deleteService);

  return router;
};
