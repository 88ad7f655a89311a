import winston, { Logger } from 'winston';
import { getLibraryConfig } from '../config/config';

const LOG_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LOG_FILE = 'log/media-library.log';

/**
 * Unified formatter that tags each entry with a timestamp and level.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf((info) => `[${info.timestamp}][${info.level}]${info.message}`),
);

function isKnownLevel(level: string): boolean {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);
}

function createFileTransport(level: string): winston.transport {
  return new winston.transports.File({ filename: LOG_FILE, level });
}

const { consoleLevel, fileLevel } = getLibraryConfig().logging;

const transports: winston.transport[] = [
  new winston.transports.Console({ level: isKnownLevel(consoleLevel) ? consoleLevel : 'info' }),
];
if (isKnownLevel(fileLevel)) {
  transports.push(createFileTransport(fileLevel));
}

/**
 * Winston-based logger for the media library service.
 * Console level comes from config; the file transport is added only for a known file level.
 */
const logger: Logger = winston.createLogger({
  level: 'debug',
  levels: LOG_LEVELS,
  format: logFormat,
  transports,
});

export default logger;
