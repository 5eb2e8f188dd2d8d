import { eq } from 'drizzle-orm';
import { users, NewUser, User } from '../db/schema';
import { Executor } from './executor';
import { UserRepository, UserUpdateInput } from './types';

export const createUserRepository = (db: Executor): UserRepository => ({
  async findById(id) {
    const results = await db.select().from(users).where(eq(users.id, id));
    return results[0];
  },

  async findByEmail(email) {
    const results = await db.select().from(users).where(eq(users.email, email));
    return results[0];
  },

  async create(input: NewUser): Promise<User> {
    const inserted = await db.insert(users).values(input).returning();
    const user = inserted[0];
    if (!user) {
      throw new Error('Failed to create user');
    }
    return user;
  },

  async update(id: string, input: UserUpdateInput) {
    const updated = await db
      .update(users)
      .set({ ...input, updatedAt: new Date() })
      .where(eq(users.id, id))
      .returning();
    return updated[0];
  },
});
