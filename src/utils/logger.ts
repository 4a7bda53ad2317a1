import winston from 'winston';

const { combine, timestamp, errors, printf } = winston.format;

const line = printf(({ level, message, timestamp: time, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${time} ${level.toUpperCase()}: ${message}${extra}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: combine(errors({ stack: true }), timestamp(), line),
  transports: [new winston.transports.Console()],
});
