/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, STORAGE_CONFIG } from './environments';
 *
 *   const file = STORAGE_CONFIG.dataFile;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// STORAGE CONFIGURATION
// =============================================================================

/**
 * Data file location and startup behaviour
 *
 * LIBRARY_AUTOLOAD=false starts every session with an empty library.
 */
export const STORAGE_CONFIG = {
  dataFile: process.env.LIBRARY_DATA_FILE || 'library_data.json',
  autoload: process.env.LIBRARY_AUTOLOAD !== 'false',
  jsonIndent: 2,
};

// =============================================================================
// REPORT CONFIGURATION
// =============================================================================

const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = parseInt(raw || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Report limits
 */
export const REPORT_CONFIG = {
  popularTopN: parsePositiveInt(process.env.REPORT_TOP_N, 10),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 *
 * Logs always go to stderr; stdout belongs to the menu.
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  prettyPrint: isDevelopment,
  serviceName: process.env.LOG_SERVICE_NAME || 'library-manager',
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  dataFile: STORAGE_CONFIG.dataFile,
  autoload: STORAGE_CONFIG.autoload,
});
