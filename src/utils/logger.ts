import winston from 'winston';
import path from 'path';
import config from './config.js';

/**
 * Custom log format combining timestamp and message.
 * Format: `YYYY-MM-DDTHH:mm:ss.sssZ [LEVEL]: message`
 */
const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ level, message, timestamp }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

/**
 * Console output always goes to stderr: stdout carries the MCP protocol when the
 * library runs behind the stdio adapter.
 */
const transports: winston.transport[] = [
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'debug', 'verbose', 'silly'],
  }),
];

if (config.logger.file) {
  const parsed = path.parse(config.logger.file);
  transports.push(
    new winston.transports.File({ filename: config.logger.file }),
    new winston.transports.File({
      filename: path.join(parsed.dir, `${parsed.name}.error${parsed.ext || '.log'}`),
      level: 'error',
    }),
  );
}

/**
 * Library logger instance configured with timestamped format.
 * The log level is determined by the configuration (defaulting to 'info').
 */
const logger = winston.createLogger({
  level: config.logger.level,
  format: logFormat,
  transports,
});

export default logger;
