import pino from 'pino';

import { config } from '../config';
import { commandLogFields } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs
 * - Development: Pretty printed logs
 * - Test: Silent unless LOG_LEVEL is set
 *
 * Everything is written to stderr (fd 2) so log lines never mix with the menu.
 */
const options: pino.LoggerOptions = {
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: config.logging.serviceName,
    env: config.nodeEnv,
  },
  // Attach the current menu command to every line logged while it runs
  mixin: commandLogFields,
};

export const logger = config.logging.prettyPrint
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

// Child logger factory for service-specific logging
export const createServiceLogger = (serviceName: string) => {
  return logger.child({ service: serviceName });
};
