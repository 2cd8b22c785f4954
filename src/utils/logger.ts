import winston from 'winston';
import path from 'path';

/**
 * Analyzer logging
 *
 * Each pipeline component (quota probe, caller, orchestrator, writer) gets
 * its own winston logger tagged with `component`; JobLogger adds the job id
 * so one batch can be followed through logs/combined.log. Record-level
 * failures go to logs/error.log as well. LOG_SILENT=true mutes every
 * transport and skips the log files (the test suite sets it).
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function isSilenced(): boolean {
  return process.env.LOG_SILENT === 'true';
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'QuotaProbe', 'BatchOrchestrator')
 */
export function createLogger(component: string): winston.Logger {
  const silent = isSilenced();
  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
  });

  const transports = silent
    ? [consoleTransport]
    : [
        consoleTransport,
        new winston.transports.File({
          filename: path.join(process.cwd(), 'logs', 'combined.log'),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        new winston.transports.File({
          filename: path.join(process.cwd(), 'logs', 'error.log'),
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
      ];

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    silent,
    transports,
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Component logger bound to one job id
 */
export class JobLogger {
  private logger: winston.Logger;
  private jobId: string;

  constructor(jobId: string) {
    this.jobId = jobId;
    this.logger = createLogger(`Job:${jobId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { jobId: this.jobId, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      jobId: this.jobId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { jobId: this.jobId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { jobId: this.jobId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Batch started', metadata);
  }

  completed(metadata?: object) {
    this.info('Batch completed', metadata);
  }

  failed(error: unknown, metadata?: object) {
    this.error('Batch failed', error, metadata);
  }
}
