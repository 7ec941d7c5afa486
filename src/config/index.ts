import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  LEDGER_CONFIG,
  JWT_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
} from './environments';

// Re-export environment-specific configs for direct access
export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * For environment-specific values, you can also import directly from './environments'
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // MongoDB
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Ledger
  ledger: LEDGER_CONFIG,

  // JWT verification
  jwt: JWT_CONFIG,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // Rate Limiting
  rateLimit: RATE_LIMIT_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};
