import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  API_CONFIG,
  LOG_CONFIG,
  ATM_CONFIG,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, getEnvironmentInfo };

export * from './environments';

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

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // Logging
  logging: LOG_CONFIG,

  // ATM host
  atm: ATM_CONFIG,
};
