/**
 * Application logger (pino)
 */

import pino from 'pino';
import { env } from '../config/env.js';

const isTest = env.NODE_ENV === 'test';
const isDevelopment = env.NODE_ENV === 'development';

export const logger = pino({
  name: env.APP_NAME,
  level: isTest ? 'silent' : env.LOG_LEVEL,
  serializers: {
    error: pino.stdSerializers.err,
  },
  ...(isDevelopment && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,name',
      },
    },
  }),
});
