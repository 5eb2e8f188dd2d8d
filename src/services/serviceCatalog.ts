import { Review, Service } from '../db/schema';
import { ReviewRepository, ServiceFilter, ServiceRepository, ServiceUpdateInput } from '../repositories/types';
import { NotFoundError } from '../utils/errors';

export interface CreateServiceInput {
  title: string;
  description: string;
  price: number;
  durationMinutes: number;
  isActive: boolean;
}

export type UpdateServiceInput = Partial<CreateServiceInput>;

// decimal columns travel as strings
const formatPrice = (price: number): string => price.toFixed(2);

export const createServiceCatalog = (services: ServiceRepository, reviews: ReviewRepository) => {
  const getService = async (id: string): Promise<Service> => {
    const service = await services.findById(id);
    if (!service) {
      throw new NotFoundError('Service not found', 'SERVICE_NOT_FOUND');
    }
    return service;
  };

  return {
    listServices: (filter: ServiceFilter): Promise<Service[]> => services.list(filter),

    getService,

    createService: (input: CreateServiceInput): Promise<Service> =>
      services.create({ ...input, price: formatPrice(input.price) }),

    async updateService(id: string, input: UpdateServiceInput): Promise<Service> {
      const { price, ...rest } = input;
      const changes: ServiceUpdateInput = { ...rest };
      if (price !== undefined) {
        changes.price = formatPrice(price);
      }

      const updated = await services.update(id, changes);
      if (!updated) {
        throw new NotFoundError('Service not found', 'SERVICE_NOT_FOUND');
      }
      return updated;
    },

    async deleteService(id: string): Promise<void> {
      const deleted = await services.delete(id);
      if (!deleted) {
        throw new NotFoundError('Service not found', 'SERVICE_NOT_FOUND');
      }
    },

    async listServiceReviews(id: string): Promise<Review[]> {
      await getService(id);
      return reviews.listByServiceId(id);
    },
  };
};

export type ServiceCatalog = ReturnType<typeof createServiceCatalog>;
