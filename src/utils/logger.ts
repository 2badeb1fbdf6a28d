import winston from 'winston';
import { config } from '../config';

const { combine, timestamp, printf, colorize, json } = winston.format;

const devFormat = combine(
  colorize(),
  timestamp({ format: 'HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message} ${metaStr}`;
  })
);

const prodFormat = combine(
  timestamp(),
  json()
);

export const logger = winston.createLogger({
  level: config.logLevel ?? (config.nodeEnv === 'production' ? 'info' : 'debug'),
  format: config.nodeEnv === 'production' ? prodFormat : devFormat,
  silent: config.nodeEnv === 'test',
  transports: [
    new winston.transports.Console(),
  ],
});

export default logger;
