import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test';

export const logger = pino({
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
  transport:
    process.env.NODE_ENV === 'production' || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
});
