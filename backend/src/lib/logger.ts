import pino from 'pino';

// Plain JSON logging; pretty-printing is left to the consumer (`| pino-pretty`)
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
});

export default logger;
