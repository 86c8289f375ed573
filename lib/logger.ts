import pino from 'pino';

const logger = pino({
  name: 'surbl',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
