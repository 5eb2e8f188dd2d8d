import Joi from 'joi';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  databaseUrl: string;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  refreshTokenExpireDays: number;
  bcryptRounds: number;
  allowedOrigins: string[];
}

interface RawEnv {
  NODE_ENV: string;
  PORT: number;
  DATABASE_URL: string;
  JWT_SECRET: string;
  ACCESS_TOKEN_EXPIRE_MINUTES: number;
  REFRESH_TOKEN_EXPIRE_DAYS: number;
  BCRYPT_ROUNDS: number;
  FRONTEND_URL: string;
  ALLOWED_ORIGINS?: string;
}

const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(3000),
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }).required().messages({
    'any.required': 'DATABASE_URL environment variable is required',
  }),
  JWT_SECRET: Joi.string().min(8).required().messages({
    'any.required': 'JWT_SECRET environment variable is required',
  }),
  ACCESS_TOKEN_EXPIRE_MINUTES: Joi.number().integer().positive().default(30),
  REFRESH_TOKEN_EXPIRE_DAYS: Joi.number().integer().positive().default(7),
  BCRYPT_ROUNDS: Joi.number().integer().min(4).max(31).default(12),
  FRONTEND_URL: Joi.string().uri().default('http://localhost:3001'),
  ALLOWED_ORIGINS: Joi.string().optional(),
}).unknown(true);

/**
 * Validate the process environment and shape it into typed settings
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.validate(env, { abortEarly: false });
  if (result.error) {
    throw new Error(`Invalid environment configuration: ${result.error.details.map(d => d.message).join('; ')}`);
  }
  const value = result.value;

  const allowedOrigins = value.ALLOWED_ORIGINS
    ? value.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
    : [value.FRONTEND_URL];

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    databaseUrl: value.DATABASE_URL,
    jwtSecret: value.JWT_SECRET,
    accessTokenExpireMinutes: value.ACCESS_TOKEN_EXPIRE_MINUTES,
    refreshTokenExpireDays: value.REFRESH_TOKEN_EXPIRE_DAYS,
    bcryptRounds: value.BCRYPT_ROUNDS,
    allowedOrigins,
  };
};
