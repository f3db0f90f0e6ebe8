import pino from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';
const isProduction = nodeEnv === 'production';
const isTest = nodeEnv === 'test';

const logger = pino({
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
  base: { service: 'decision-engine' },
  ...(isProduction || isTest
    ? {
        // Production: structured JSON logging
        formatters: {
          level: (label) => {
            return { level: label };
          },
        },
      }
    : {
        // Development: pretty printed logs
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      }),
});

export { logger };
export default logger;
