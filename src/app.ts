import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from './config';
import { DataStore } from './repositories/types';
import { createAuthenticateToken } from './middlewares/auth';
import { createErrorHandler } from './middlewares/errorHandler';
import { createTokenService } from './utils/tokens';
import { Clock, systemClock } from './utils/clock';
import { formatError } from './utils/helpers';
import { createAuthService } from './services/authService';
import { createUsersService } from './services/usersService';
import { createServiceCatalog } from './services/serviceCatalog';
import { createBookingsService } from './services/bookingsService';
import { createReviewsService } from './services/reviewsService';

// Import routers
import { createAuthRouter } from './routers/authRouter';
import { createUsersRouter } from './routers/usersRouter';
import { createServicesRouter } from './routers/servicesRouter';
import { createBookingsRouter } from './routers/bookingsRouter';
import { createReviewsRouter } from './routers/reviewsRouter';

export type AppSettings = Omit<AppConfig, 'port' | 'databaseUrl'>;

export interface AppDependencies {
  config: AppSettings;
  store: DataStore;
  clock?: Clock;
}

const MINUTE_SECONDS = 60;
const DAY_SECONDS = 24 * 60 * MINUTE_SECONDS;

export const createApp = ({ config, store, clock = systemClock }: AppDependencies): express.Express => {
  const app = express();

  const tokens = createTokenService({
    secret: config.jwtSecret,
    accessTokenTtlSeconds: config.accessTokenExpireMinutes * MINUTE_SECONDS,
    refreshTokenTtlSeconds: config.refreshTokenExpireDays * DAY_SECONDS,
  });
  const authenticateToken = createAuthenticateToken(tokens);

  // Security middleware
  app.use(helmet());

  // CORS configuration
  app.use(
    cors({
      origin: config.allowedOrigins,
      credentials: true,
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware (simple console logging)
  if (config.nodeEnv !== 'test') {
    app.use((req, res, next) => {
      console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
      next();
    });
  }

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  // API Routes
  app.use('/api/auth', createAuthRouter(createAuthService({ users: store.users, tokens, bcryptRounds: config.bcryptRounds })));
  app.use('/api/users', createUsersRouter(createUsersService(store.users), authenticateToken));
  app.use('/api/services', createServicesRouter(createServiceCatalog(store.services, store.reviews), authenticateToken));
  app.use('/api/bookings', createBookingsRouter(createBookingsService({ store, clock }), authenticateToken));
  app.use('/api/reviews', createReviewsRouter(createReviewsService(store.bookings, store.reviews), authenticateToken));

  // Root endpoint
  app.get('/', (req, res) => {
    res.json({
      message: 'Welcome to the Booking API',
      version: '1.0.0',
      endpoints: {
        auth: '/api/auth',
        users: '/api/users',
        services: '/api/services',
        bookings: '/api/bookings',
        reviews: '/api/reviews',
      },
    });
  });

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      ...formatError('Endpoint not found', 'NOT_FOUND'),
      path: req.originalUrl,
      method: req.method,
    });
  });

  // Global error handler
  app.use(createErrorHandler(config.nodeEnv));

  return app;
};
