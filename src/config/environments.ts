/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, LEDGER_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment. Transfers use multi-document transactions,
 * so the server must run as a replica set.
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/credit-ledger?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/credit-ledger-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/credit-ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

export type LedgerStoreDriver = 'mongo' | 'memory';

const parseStoreDriver = (value: string | undefined): LedgerStoreDriver => {
  if (value === 'memory' || value === 'mongo') {
    return value;
  }
  return isTest ? 'memory' : 'mongo';
};

/**
 * Ledger behaviour
 *
 * LEDGER_STORE=memory keeps accounts and entries in process (single instance only).
 */
export const LEDGER_CONFIG = {
  storeDriver: parseStoreDriver(process.env.LEDGER_STORE),
  lockTimeoutMs: parseInt(process.env.LEDGER_LOCK_TIMEOUT_MS || '5000', 10),
  maxCommitTimeMs: parseInt(process.env.LEDGER_MAX_COMMIT_TIME_MS || '5000', 10),
  defaultPageLimit: parseInt(process.env.LEDGER_PAGE_LIMIT_DEFAULT || '20', 10),
  maxPageLimit: parseInt(process.env.LEDGER_PAGE_LIMIT_MAX || '100', 10),
  maxNoteLength: 500,
};

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT secret used to verify actor tokens issued by the identity service
 */
export const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  issuer: process.env.JWT_ISSUER || undefined,
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * In test/development environments, rate limits are significantly relaxed.
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Transfer and issuance limiter, keyed by actor
  transfer: {
    windowMs: parseInt(process.env.TRANSFER_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.TRANSFER_RATE_LIMIT_MAX || '30', 10)
      : isTest
      ? 10000
      : parseInt(process.env.TRANSFER_RATE_LIMIT_MAX || '300', 10),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'MONGODB_URI', 'CORS_ORIGINS'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }

  if (LEDGER_CONFIG.storeDriver === 'memory') {
    throw new Error('LEDGER_STORE=memory is not allowed in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  storeDriver: LEDGER_CONFIG.storeDriver,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
});
