/**
 * Structured Logger
 *
 * Logs to console and .switchboard/logs/session-<timestamp>.jsonl
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SERVICE_NAME = 'switchboard';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_PRIORITY, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

let logFileStream: fs.WriteStream | null = null;
let logFilePath: string | null = null;
let consoleEnabled = true;

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatConsoleMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `${timestamp} [${level.toUpperCase()}]: ${message}`;
}

function writeToFile(entry: LogEntry): void {
  if (logFileStream) {
    logFileStream.write(JSON.stringify(entry) + '\n');
  }
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    message,
    data
  };

  writeToFile(entry);

  if (!consoleEnabled || !shouldLog(level)) {
    return;
  }

  const line = formatConsoleMessage(level, message);
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export const logger = {
  /**
   * Open the JSONL session log under `<logsDir>`
   */
  init(logsDir: string): void {
    if (logFileStream) return;

    try {
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      logFilePath = path.join(logsDir, `session-${timestamp}.jsonl`);
      logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' });

      this.debug('Logger initialized', { logFile: logFilePath });
    } catch (error) {
      console.error('Failed to initialize logger:', error);
    }
  },

  debug(message: string, data?: Record<string, unknown>): void {
    log('debug', message, data);
  },

  info(message: string, data?: Record<string, unknown>): void {
    log('info', message, data);
  },

  warn(message: string, data?: Record<string, unknown>): void {
    log('warn', message, data);
  },

  error(message: string, data?: Record<string, unknown>): void {
    log('error', message, data);
  },

  getLogFile(): string | null {
    return logFilePath;
  },

  close(): void {
    if (logFileStream) {
      logFileStream.end();
      logFileStream = null;
      logFilePath = null;
    }
  }
};

export type Logger = typeof logger;

/**
 * The REPL turns console output off so log lines don't interleave with answers.
 * The session file keeps receiving every entry.
 */
export function setConsoleLoggingEnabled(enabled: boolean): void {
  consoleEnabled = enabled;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}
