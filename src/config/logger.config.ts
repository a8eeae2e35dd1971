import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const devFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${details}`;
});

export const logger = winston.createLogger({
  level: logLevel,
  // Jest sets NODE_ENV=test
  silent: nodeEnv === 'test',
  defaultMeta: { service: 'board-game-engine' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nodeEnv === 'production' ? winston.format.json() : devFormat
  ),
  transports: [new winston.transports.Console()],
});
