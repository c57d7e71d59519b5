/**
 * ContactBook Configuration
 * Environment variables mapped to flat config keys
 */

export default () => ({
  // Token signing (REQUIRED - no defaults for security)
  secretKey: process.env.SECRET_KEY,
  algorithm: process.env.ALGORITHM,
  accessTokenTtlSeconds: parseInt(process.env.ACCESS_TOKEN_TTL_SECONDS || '900', 10), // 15 minutes
  confirmationTokenTtlSeconds: parseInt(
    process.env.CONFIRMATION_TOKEN_TTL_SECONDS || '604800', // 7 days
    10,
  ),

  // Database Configuration
  databaseUrl: process.env.DATABASE_URL,
  schemaPath: process.env.SCHEMA_PATH || 'sql/schema.sql',

  // Session cache
  cacheDriver: process.env.CACHE_DRIVER || 'redis',
  redisHost: process.env.REDIS_HOST || 'localhost',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),

  // Outbound email
  mailRelayUrl: process.env.MAIL_RELAY_URL,
  mailFrom: process.env.MAIL_FROM || 'no-reply@contactbook.local',

  // Avatar storage
  storageBasePath: process.env.STORAGE_BASE_PATH || './data',
  publicUrl: process.env.PUBLIC_URL || 'http://localhost:8000',

  port: parseInt(process.env.PORT || '8000', 10),
});
