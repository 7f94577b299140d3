import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  STORAGE_CONFIG,
  REPORT_CONFIG,
  LOG_CONFIG,
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

  // Persistence
  storage: STORAGE_CONFIG,

  // Reports
  reports: REPORT_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};

export type AppConfig = typeof config;
