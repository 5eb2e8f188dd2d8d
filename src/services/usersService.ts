import { PublicUser } from '../db/schema';
import { Actor } from '../domain/actor';
import { UserRepository, UserUpdateInput } from '../repositories/types';
import { ConflictError, NotFoundError } from '../utils/errors';
import { normalizeEmail } from '../utils/helpers';
import { toPublicUser } from './authService';

export const createUsersService = (users: UserRepository) => ({
  async getProfile(actor: Actor): Promise<PublicUser> {
    const user = await users.findById(actor.userId);
    if (!user) {
      throw new NotFoundError('User not found', 'USER_NOT_FOUND');
    }
    return toPublicUser(user);
  },

  async updateProfile(actor: Actor, input: UserUpdateInput): Promise<PublicUser> {
    const changes: UserUpdateInput = { ...input };

    if (changes.email) {
      changes.email = normalizeEmail(changes.email);
      const existingUser = await users.findByEmail(changes.email);
      if (existingUser && existingUser.id !== actor.userId) {
        throw new ConflictError('Email already in use', 'EMAIL_IN_USE');
      }
    }

    const updated = await users.update(actor.userId, changes);
    if (!updated) {
      throw new NotFoundError('User not found', 'USER_NOT_FOUND');
    }
    return toPublicUser(updated);
  },
});

export type UsersService = ReturnType<typeof createUsersService>;
