import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Optional file output, enabled with CLIDEF_LOG_FILE
  files: {
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    cli: {
      level: 'warn'
    },
    parser: {
      level: 'warn'
    },
    validation: {
      level: 'warn'
    },
    interpreter: {
      level: 'warn'
    },
    http: {
      level: 'warn'
    },
    compiler: {
      level: 'warn'
    }
  }
} as const;

export type LoggingService = keyof typeof loggingConfig.services;
