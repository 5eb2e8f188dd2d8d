export const USER_ROLES = ['user', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

/**
 * The authenticated caller of an operation.
 * Built from a verified access token and passed explicitly into every service call.
 */
export interface Actor {
  userId: string;
  role: UserRole;
}

export const isAdmin = (actor: Actor): boolean => actor.role === 'admin';

export const isOwner = (actor: Actor, resource: { userId: string }): boolean =>
  actor.userId === resource.userId;
