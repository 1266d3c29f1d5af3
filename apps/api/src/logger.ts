import pino from 'pino';

const isDev = process.env.NODE_ENV === 'development';

export const logger = pino({
  name: 'tablecast',
  level: process.env.LOG_LEVEL || 'info',
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' }
      }
    : undefined
});
