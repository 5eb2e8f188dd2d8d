import { and, eq, gte, ilike, lte, or, SQL } from 'drizzle-orm';
import { services } from '../db/schema';
import { Executor } from './executor';
import { ServiceFilter, ServiceRepository } from './types';

/**
 * `%term%` for ILIKE, with the term's own `\`, `%` and `_` matched literally
 */
export const containsPattern = (term: string): string => `%${term.replace(/[\\%_]/g, '\\$&')}%`;

const buildConditions = ({ q, priceMin, priceMax, active }: ServiceFilter): SQL[] => {
  const conditions: SQL[] = [];

  if (q) {
    const pattern = containsPattern(q);
    const textMatch = or(ilike(services.title, pattern), ilike(services.description, pattern));
    if (textMatch) conditions.push(textMatch);
  }
  if (priceMin !== undefined) {
    conditions.push(gte(services.price, priceMin.toFixed(2)));
  }
  if (priceMax !== undefined) {
    conditions.push(lte(services.price, priceMax.toFixed(2)));
  }
  if (active !== undefined) {
    conditions.push(eq(services.isActive, active));
  }

  return conditions;
};

export const createServiceRepository = (db: Executor): ServiceRepository => ({
  async findById(id) {
    const results = await db.select().from(services).where(eq(services.id, id));
    return results[0];
  },

  async list(filter) {
    return db
      .select()
      .from(services)
      .where(and(...buildConditions(filter)))
      .orderBy(services.title);
  },

  async create(input) {
    const inserted = await db.insert(services).values(input).returning();
    const service = inserted[0];
    if (!service) {
      throw new Error('Failed to create service');
    }
    return service;
  },

  async update(id, input) {
    const updated = await db
      .update(services)
      .set({ ...input, updatedAt: new Date() })
      .where(eq(services.id, id))
      .returning();
    return updated[0];
  },

  async delete(id) {
    const deleted = await db.delete(services).where(eq(services.id, id)).returning({ id: services.id });
    return deleted.length > 0;
  },
});
