import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

function resolveLogDir(configured?: string): string {
  const logDir = configured ?? path.join(os.homedir(), '.depth-trials', 'logs');
  try {
    fs.mkdirSync(logDir, { recursive: true });
    return logDir;
  } catch (error) {
    console.error(
      `Failed to create log directory ${logDir}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return os.tmpdir();
  }
}

/**
 * Console plus daily rotated run/error logs.
 */
export function createWinstonLogger(configuredLogDir?: string): winston.Logger {
  const logDir = resolveLogDir(configuredLogDir);

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      const stackStr = stack ? `\n${String(stack)}` : '';
      return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
    }),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
    }),
  );

  const runLogTransport = new DailyRotateFile({
    filename: path.join(logDir, 'depth-trials-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'debug',
  });

  const errorLogTransport = new DailyRotateFile({
    filename: path.join(logDir, 'depth-trials-error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level: process.env.DEPTH_TRIALS_LOG_LEVEL ?? 'info',
  });

  return winston.createLogger({
    level: 'debug',
    transports: [consoleTransport, runLogTransport, errorLogTransport],
  });
}
