import * as fs from 'fs';
import * as path from 'path';
import * as util from 'util';
import { config } from '../config';

// Log levels
type LogLevel = 'info' | 'warn' | 'error' | 'debug';

let logStream: fs.WriteStream | null = null;

/**
 * Opens the log file on first use. Only used when LOG_TO_FILE is set.
 */
function getLogStream(): fs.WriteStream {
  if (!logStream) {
    const logDir = path.resolve(config.logging.dir);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const logPath = path.join(logDir, `autograde-${timestamp}.log`);
    logStream = fs.createWriteStream(logPath, { flags: 'a', encoding: 'utf8' });
  }
  return logStream;
}

/**
 * Formats a log message with timestamp and level
 */
function formatLogMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = new Date().toLocaleString();
  const formattedMessage = args.length > 0 ? util.format(message, ...args) : message;
  const paddedLevel = level.toUpperCase().padEnd(5, ' '); // 5 is the length of 'DEBUG'
  return `[${timestamp}] [${paddedLevel}] ${formattedMessage}`;
}

/**
 * Writes a log message to stderr and, if enabled, the log file.
 * Stdout is reserved for the autograder feedback line.
 */
function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (level === 'debug' && !config.debug) {
    return;
  }
  const formattedMessage = formatLogMessage(level, message, ...args);

  process.stderr.write(formattedMessage + '\n');

  if (config.logging.toFile) {
    getLogStream().write(formattedMessage + '\n');
  }
}

/**
 * Logger utility for consistent logging across the application
 */
export const logger = {
  info: (message: string, ...args: unknown[]) => log('info', message, ...args),
  warn: (message: string, ...args: unknown[]) => log('warn', message, ...args),
  error: (message: string, ...args: unknown[]) => log('error', message, ...args),
  debug: (message: string, ...args: unknown[]) => log('debug', message, ...args),

  // Close the log stream (call this when the application exits)
  close: () => {
    if (logStream) {
      logStream.end();
      logStream = null;
    }
  }
};

// Close log stream on process exit
process.on('exit', () => {
  logger.close();
});
