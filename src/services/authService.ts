import { PublicUser, User } from '../db/schema';
import { UserRepository } from '../repositories/types';
import { comparePassword, hashPassword, normalizeEmail } from '../utils/helpers';
import { ConflictError, UnauthorizedError } from '../utils/errors';
import { TokenPair, TokenService } from '../utils/tokens';

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface AuthServiceDeps {
  users: UserRepository;
  tokens: TokenService;
  bcryptRounds: number;
}

// Strip the password hash before a user leaves the service layer
export const toPublicUser = (user: User): PublicUser => ({
  id: user.id,
  name: user.name,
  email: user.email,
  role: user.role,
  createdAt: user.createdAt,
  updatedAt: user.updatedAt,
});

export const createAuthService = ({ users, tokens, bcryptRounds }: AuthServiceDeps) => ({
  async register({ name, email, password }: RegisterInput): Promise<PublicUser> {
    const normalizedEmail = normalizeEmail(email);

    const existingUser = await users.findByEmail(normalizedEmail);
    if (existingUser) {
      throw new ConflictError('User with this email already exists', 'USER_EXISTS');
    }

    const passwordHash = await hashPassword(password, bcryptRounds);
    const user = await users.create({
      name,
      email: normalizedEmail,
      passwordHash,
      role: 'user',
    });

    return toPublicUser(user);
  },

  async login({ email, password }: LoginInput): Promise<TokenPair> {
    const user = await users.findByEmail(normalizeEmail(email));

    // Same answer for unknown email and wrong password
    if (!user || !(await comparePassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Invalid email or password', 'INVALID_CREDENTIALS');
    }

    return tokens.issueTokenPair({ userId: user.id, role: user.role });
  },

  async refresh(refreshToken: string): Promise<TokenPair> {
    const { userId } = tokens.verifyRefreshToken(refreshToken);

    const user = await users.findById(userId);
    if (!user) {
      throw new UnauthorizedError('User not found', 'INVALID_TOKEN');
    }

    // Re-read the role so a promotion or demotion applies on the next refresh
    return tokens.issueTokenPair({ userId: user.id, role: user.role });
  },
});

export type AuthService = ReturnType<typeof createAuthService>;
