/**
 * Portal Configuration
 * Environment variables with development defaults
 */

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

export default () => {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isProduction = nodeEnv === 'production';

  return {
    nodeEnv,
    port: parseInt(process.env.PORT || '8000', 10),
    appName: process.env.APP_NAME || 'portal',
    baseUrl: process.env.BASE_URL || 'http://localhost:8000',
    corsOrigin: process.env.CORS_ORIGIN,

    // Stores
    databaseUrl: process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379/0',
    runMigrations: bool(process.env.RUN_MIGRATIONS, false),
    migrationsDir: process.env.MIGRATIONS_DIR || 'libs/sql/migrations',

    // Access credentials (no default secret outside development)
    jwtSecret:
      process.env.JWT_SECRET ||
      (isProduction ? undefined : 'portal_dev_jwt_secret_change_me'),
    accessTokenTtlMinutes: parseInt(
      process.env.JWT_ACCESS_TOKEN_EXPIRE_MINUTES || '60',
      10,
    ),
    clockSkewSeconds: parseInt(process.env.JWT_CLOCK_SKEW_SECONDS || '0', 10),

    // Refresh credentials
    refreshTokenTtlDays: parseInt(process.env.REFRESH_TOKEN_EXPIRE_DAYS || '7', 10),
    refreshTokenHashSalt: process.env.REFRESH_TOKEN_HASH_SALT || '',
    refreshTokenHashPepper: process.env.REFRESH_TOKEN_HASH_PEPPER || '',
    deviceCookieMaxAgeDays: parseInt(
      process.env.DEVICE_COOKIE_MAX_AGE_DAYS || '365',
      10,
    ),

    // Operator-facing error detail (missing permission codes etc.)
    exposeErrorDetail: bool(process.env.EXPOSE_ERROR_DETAIL, !isProduction),
  };
};
