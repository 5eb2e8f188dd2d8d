import request from 'supertest';
import jwt from 'jsonwebtoken';
import { User } from '../db/schema';
import { bearer, buildTestApp, seedUser, TEST_PASSWORD, testTokens } from './support/testApp';

describe('Auth API', () => {
  let ctx: ReturnType<typeof buildTestApp>;
  let user: User;

  beforeEach(async () => {
    ctx = buildTestApp();
    user = await seedUser(ctx.store, { email: 'test@example.com' });
  });

  describe('POST /api/auth/register', () => {
    it('creates a user with the default role and a normalized email', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/register')
        .send({ name: 'New User', email: 'NewUser@Example.com', password: 'password123' });

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({ name: 'New User', email: 'newuser@example.com', role: 'user' });
      expect(res.body.data).not.toHaveProperty('passwordHash');
    });

    it('rejects a duplicate email', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/register')
        .send({ name: 'Another User', email: 'test@example.com', password: 'password123' });

      expect(res.status).toBe(409);
      expect(res.body.code).toBe('USER_EXISTS');
    });

    it('rejects a short password', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/register')
        .send({ name: 'New User', email: 'newuser@example.com', password: 'short' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Password must be at least 8 characters long');
    });

    it('cannot be used to self-assign the admin role', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/register')
        .send({ name: 'Sneaky', email: 'sneaky@example.com', password: 'password123', role: 'admin' });

      expect(res.status).toBe(201);
      expect(res.body.data.role).toBe('user');
    });
  });

  describe('POST /api/auth/login', () => {
    it('returns a bearer token pair for valid credentials', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/login')
        .send({ email: 'test@example.com', password: TEST_PASSWORD });

      expect(res.status).toBe(200);
      expect(res.body.data.tokenType).toBe('bearer');
      expect(testTokens.verifyAccessToken(res.body.data.accessToken)).toEqual({ userId: user.id, role: 'user' });
      expect(testTokens.verifyRefreshToken(res.body.data.refreshToken)).toEqual({ userId: user.id, role: 'user' });
    });

    it('rejects a wrong password and an unknown email alike', async () => {
      const wrongPassword = await request(ctx.app)
        .post('/api/auth/login')
        .send({ email: 'test@example.com', password: 'wrongpassword' });
      const unknownEmail = await request(ctx.app)
        .post('/api/auth/login')
        .send({ email: 'nobody@example.com', password: TEST_PASSWORD });

      for (const res of [wrongPassword, unknownEmail]) {
        expect(res.status).toBe(401);
        expect(res.body).toMatchObject({ message: 'Invalid email or password', code: 'INVALID_CREDENTIALS' });
      }
    });
  });

  describe('POST /api/auth/refresh', () => {
    it('issues a new pair carrying the current role', async () => {
      const { refreshToken } = testTokens.issueTokenPair({ userId: user.id, role: 'user' });
      ctx.store.tables.users.set(user.id, { ...user, role: 'admin' });

      const res = await request(ctx.app).post('/api/auth/refresh').send({ refreshToken });

      expect(res.status).toBe(200);
      expect(testTokens.verifyAccessToken(res.body.data.accessToken)).toEqual({ userId: user.id, role: 'admin' });
    });

    it('refuses an access token', async () => {
      const { accessToken } = testTokens.issueTokenPair({ userId: user.id, role: 'user' });

      const res = await request(ctx.app).post('/api/auth/refresh').send({ refreshToken: accessToken });

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ message: 'Invalid refresh token', code: 'INVALID_TOKEN' });
    });

    it('refuses a malformed token', async () => {
      const res = await request(ctx.app).post('/api/auth/refresh').send({ refreshToken: 'not-a-token' });

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ message: 'Invalid token', code: 'INVALID_TOKEN' });
    });

    it('refuses a token for a deleted user', async () => {
      const { refreshToken } = testTokens.issueTokenPair({ userId: user.id, role: 'user' });
      ctx.store.tables.users.delete(user.id);

      const res = await request(ctx.app).post('/api/auth/refresh').send({ refreshToken });

      expect(res.status).toBe(401);
      expect(res.body.message).toBe('User not found');
    });
  });

  it('acknowledges logout with no content', async () => {
    const res = await request(ctx.app).post('/api/auth/logout');
    expect(res.status).toBe(204);
  });

  describe('/api/users/me', () => {
    it('returns the caller’s profile', async () => {
      const res = await request(ctx.app).get('/api/users/me').set('Authorization', bearer(user));

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: user.id, email: 'test@example.com', role: 'user' });
    });

    it('rejects an expired token', async () => {
      const expired = jwt.sign({ sub: user.id, role: 'user', type: 'access' }, 'test-secret', { expiresIn: -10 });

      const res = await request(ctx.app).get('/api/users/me').set('Authorization', `Bearer ${expired}`);

      expect(res.status).toBe(401);
      expect(res.body.code).toBe('TOKEN_EXPIRED');
    });

    it('requires a bearer token', async () => {
      const res = await request(ctx.app).get('/api/users/me');

      expect(res.status).toBe(401);
      expect(res.body.code).toBe('UNAUTHENTICATED');
    });

    it('updates the name and email', async () => {
      const res = await request(ctx.app)
        .patch('/api/users/me')
        .set('Authorization', bearer(user))
        .send({ name: 'Renamed', email: 'Renamed@Example.com' });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ name: 'Renamed', email: 'renamed@example.com' });
    });

    it('refuses an email that belongs to someone else', async () => {
      await seedUser(ctx.store, { email: 'taken@example.com' });

      const res = await request(ctx.app)
        .patch('/api/users/me')
        .set('Authorization', bearer(user))
        .send({ email: 'taken@example.com' });

      expect(res.status).toBe(409);
      expect(res.body.code).toBe('EMAIL_IN_USE');
    });

    it('allows re-submitting the caller’s own email', async () => {
      const res = await request(ctx.app)
        .patch('/api/users/me')
        .set('Authorization', bearer(user))
        .send({ email: 'test@example.com' });

      expect(res.status).toBe(200);
    });

    it('requires at least one field', async () => {
      const res = await request(ctx.app).patch('/api/users/me').set('Authorization', bearer(user)).send({});

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Provide a name or an email to update');
    });
  });
});
