import winston from 'winston';

const env = process.env.NODE_ENV || 'development';
const level = process.env.LOG_LEVEL || (env === 'test' ? 'error' : 'info');

const developmentFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${extra}`;
  })
);

const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

export const logger = winston.createLogger({
  level,
  format: env === 'production' ? productionFormat : developmentFormat,
  defaultMeta: { service: 'hybrid-retrieval' },
  transports: [new winston.transports.Console()],
});
