import winston, { Logger, format } from 'winston';
import path from 'path';
import fs from 'fs';
import DailyRotateFile from 'winston-daily-rotate-file';

/**
 * Logger Configuration Interface
 */
interface LoggerConfig {
  logDir: string;
  logLevel: string;
  appName: string;
  environment: string;
  maxSize: number;
  maxFiles: number;
  enableConsole: boolean;
  enableFile: boolean;
  enableDailyRotate: boolean;
}

/**
 * Ensure log directory exists
 */
const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Custom filter to match specific log level only
 */
const createLevelFilter = (targetLevel: string) => {
  return format((info) => {
    return info.level === targetLevel ? info : false;
  })();
};

/**
 * Get default configuration with environment overrides
 */
const getConfig = (): LoggerConfig => ({
  logDir: process.env.LOG_FILE_PATH || './logs',
  logLevel: process.env.LOG_LEVEL || 'info',
  appName: process.env.APP_NAME || 'FBO Reconciliation',
  environment: process.env.NODE_ENV || 'development',
  maxSize: parseInt(process.env.LOG_MAX_SIZE || '5242880', 10), // 5MB
  maxFiles: parseInt(process.env.LOG_MAX_FILES || '5', 10),
  enableConsole: true,
  enableFile: process.env.LOG_FILE !== 'false',
  enableDailyRotate: process.env.LOG_DAILY_ROTATE !== 'false',
});

/**
 * Custom format for console output with better readability
 */
const getConsoleFormat = () => {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.colorize({ all: true }),
    format.printf(({ timestamp, level, message, service, environment: _env, ...meta }) => {
      const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
      return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
    })
  );
};

/**
 * Custom format for file output with detailed context
 */
const getFileFormat = () => {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
    format.json()
  );
};

const buildFileTransports = (config: LoggerConfig): winston.transport[] => {
  const isDevelopment = config.environment !== 'production';
  const transports: winston.transport[] = [];

  if (config.enableDailyRotate) {
    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'info',
        format: getFileFormat(),
        maxSize: config.maxSize,
        maxFiles: `${config.maxFiles}d`,
        auditFile: path.join(config.logDir, '.combined-audit.json'),
        zippedArchive: false,
      }),
      new DailyRotateFile({
        filename: path.join(config.logDir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        format: getFileFormat(),
        maxSize: config.maxSize,
        maxFiles: `${config.maxFiles}d`,
        auditFile: path.join(config.logDir, '.error-audit.json'),
        zippedArchive: false,
      })
    );

    // Reconciliation audit trails are logged at debug; keep them out of production disks
    if (isDevelopment) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(config.logDir, 'debug-%DATE%.log'),
          datePattern: 'YYYY-MM-DD',
          format: format.combine(createLevelFilter('debug'), getFileFormat()),
          maxSize: config.maxSize,
          maxFiles: `${config.maxFiles}d`,
          auditFile: path.join(config.logDir, '.debug-audit.json'),
          zippedArchive: false,
        })
      );
    }
    return transports;
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(config.logDir, 'error.log'),
      level: 'error',
      format: getFileFormat(),
      maxsize: config.maxSize,
      maxFiles: config.maxFiles,
    }),
    new winston.transports.File({
      filename: path.join(config.logDir, 'combined.log'),
      level: 'info',
      format: getFileFormat(),
      maxsize: config.maxSize,
      maxFiles: config.maxFiles,
    })
  );
  return transports;
};

/**
 * Create Winston Logger instance
 */
const createLogger = (customConfig?: Partial<LoggerConfig>): Logger => {
  const config = { ...getConfig(), ...customConfig };

  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    const consoleLevel = config.environment === 'production' ? 'info' : config.logLevel;

    transports.push(
      new winston.transports.Console({
        level: consoleLevel,
        format:
          config.environment === 'production'
            ? format.combine(format.timestamp(), format.json())
            : getConsoleFormat(),
      })
    );
  }

  if (config.enableFile) {
    ensureLogDir(config.logDir);
    transports.push(...buildFileTransports(config));
  }

  return winston.createLogger({
    level: config.logLevel,
    format: getFileFormat(),
    defaultMeta: {
      service: config.appName,
      environment: config.environment,
    },
    transports,
    exceptionHandlers: config.enableFile
      ? [
          new winston.transports.File({
            filename: path.join(config.logDir, 'exceptions.log'),
            format: getFileFormat(),
          }),
        ]
      : undefined,
    rejectionHandlers: config.enableFile
      ? [
          new winston.transports.File({
            filename: path.join(config.logDir, 'rejections.log'),
            format: getFileFormat(),
          }),
        ]
      : undefined,
  });
};

/**
 * Extract a loggable message from anything thrown
 */
const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const logger = createLogger();

export default logger;
export { getErrorMessage };
