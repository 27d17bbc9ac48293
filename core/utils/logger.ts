import winston from 'winston';
import { loggingConfig, type LoggingService } from '@core/config/logging';

export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggingService): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const ALL_LEVELS = Object.keys(loggingConfig.levels);

const isDebug = () => process.env.CLIDEF_DEBUG === 'true';
const isTest = () => process.env.NODE_ENV === 'test';

// Console output goes to stderr: stdout belongs to command output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    if (!isDebug()) {
      return `${level}: ${message}`;
    }

    let msg = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

function resolveLevel(fallback: string): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (isTest()) {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (isDebug()) {
    return 'debug';
  }

  return fallback;
}

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [];

  // Only use console transport outside of tests
  if (!isTest() || process.env.TEST_LOG_LEVEL) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: ALL_LEVELS
      })
    );
  }

  const logFile = process.env.CLIDEF_LOG_FILE;
  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        format: fileFormat,
        maxsize: loggingConfig.files.maxSize,
        maxFiles: loggingConfig.files.maxFiles,
        tailable: loggingConfig.files.tailable
      })
    );
  }

  return transports;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  createServiceLogger(serviceName: LoggingService): winston.Logger {
    const serviceConfig = loggingConfig.services[serviceName];
    const transports = createTransports();

    return winston.createLogger({
      level: resolveLevel(serviceConfig.level),
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      transports,
      silent: transports.length === 0
    });
  }
}

export const loggerFactory = new LoggerFactory();

/**
 * Raise or lower every service logger at once (the CLI's --verbose / --debug).
 */
export function setLogLevel(level: string): void {
  for (const target of Object.values(serviceLoggers)) {
    target.level = level;
    for (const transport of target.transports) {
      transport.level = level;
    }
  }
}

export const cliLogger = loggerFactory.createServiceLogger('cli');
export const parserLogger = loggerFactory.createServiceLogger('parser');
export const validationLogger = loggerFactory.createServiceLogger('validation');
export const interpreterLogger = loggerFactory.createServiceLogger('interpreter');
export const httpLogger = loggerFactory.createServiceLogger('http');
export const compilerLogger = loggerFactory.createServiceLogger('compiler');

const serviceLoggers = {
  cliLogger,
  parserLogger,
  validationLogger,
  interpreterLogger,
  httpLogger,
  compilerLogger
};

