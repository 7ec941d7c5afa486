import pino from 'pino';

import { config } from '../config';
import { logContextFields } from './log-context';

/**
 * JSON logs in production, pretty printed in development, silent in tests
 * unless LOG_LEVEL says otherwise. Lines written during a request carry its
 * correlation id, actor and committed entry.
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'credit-ledger',
    env: config.nodeEnv,
  },
  mixin: logContextFields,
  redact: ['req.headers.authorization', 'headers.authorization'],
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,env',
      },
    },
  }),
});

export const createServiceLogger = (component: string) => logger.child({ component });
