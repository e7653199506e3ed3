import winston from 'winston';
import pino from 'pino';

// Determine environment and logger preference
const isDevelopment = !process.env.NODE_ENV || process.env.NODE_ENV === '' || process.env.NODE_ENV === 'development';
export const loggerType = process.env.LOGGER?.toLowerCase() || (isDevelopment ? 'winston' : 'pino');
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Custom log levels for Winston: error < warn < info < debug < trace
// Note: Winston uses ascending numbers for less important levels
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    trace: 4
  },
  colors: {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    debug: 'blue',
    trace: 'gray'
  }
};

// Logger interface that works with both Winston and Pino
export interface Logger {
  error: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  trace: (message: string, ...args: unknown[]) => void;
  level: string;
}

let logger: Logger;

if (loggerType === 'winston') {
  // Use Winston (default for development)
  winston.addColors(customLevels.colors);

  const winstonLogger = winston.createLogger({
    levels: customLevels.levels,
    level: logLevel,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true })
    ),
    defaultMeta: { service: 'wam-multiroom-api' },
    transports: [
      new winston.transports.Console({
        format: isDevelopment
          ? winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
          : winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
          )
      })
    ]
  });

  logger = {
    error: (message: string, ...args: unknown[]) => winstonLogger.log('error', message, ...args),
    warn: (message: string, ...args: unknown[]) => winstonLogger.log('warn', message, ...args),
    info: (message: string, ...args: unknown[]) => winstonLogger.log('info', message, ...args),
    debug: (message: string, ...args: unknown[]) => winstonLogger.log('debug', message, ...args),
    // trace is a custom level, so it only exists through log()
    trace: (message: string, ...args: unknown[]) => winstonLogger.log('trace', message, ...args),
    get level() { return winstonLogger.level; },
    set level(level: string) { winstonLogger.level = level; }
  };
} else {
  // Use Pino (default for production)
  const pinoLogger = pino({
    level: logLevel,
    base: {
      service: 'wam-multiroom-api'
    },
    // Ensure consistent field ordering
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    }
  });

  type PinoMethod = 'error' | 'warn' | 'info' | 'debug' | 'trace';

  // Pino wants metadata first, message second
  const write = (method: PinoMethod, message: string, args: unknown[]): void => {
    const [meta] = args;
    if (typeof meta === 'object' && meta !== null) {
      pinoLogger[method](meta, message);
    } else if (meta === undefined) {
      pinoLogger[method](message);
    } else {
      pinoLogger[method]({ data: meta }, message);
    }
  };

  logger = {
    error: (message: string, ...args: unknown[]) => write('error', message, args),
    warn: (message: string, ...args: unknown[]) => write('warn', message, args),
    info: (message: string, ...args: unknown[]) => write('info', message, args),
    debug: (message: string, ...args: unknown[]) => write('debug', message, args),
    trace: (message: string, ...args: unknown[]) => write('trace', message, args),
    get level() { return pinoLogger.level; },
    set level(level: string) { pinoLogger.level = level; }
  };
}

export default logger;
