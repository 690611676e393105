import pino from 'pino';
import type { AppConfig } from './types.js';

type LogLevel = AppConfig['logging']['level'];

/**
 * Logger singleton. The CLI configures it once via `initLogger()`; library
 * code and tests fall back to a plain stdout logger at LOG_LEVEL.
 */
let loggerInstance: pino.Logger | null = null;

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Also append every line to this file. */
  file?: string;
}

export function initLogger(options: LoggerOptions = {}): pino.Logger {
  const { level = 'info', json = false, file } = options;

  const targets: pino.TransportTargetOptions[] = [];
  if (json) {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  } else {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    });
  }
  if (file) {
    targets.push({ target: 'pino/file', level, options: { destination: file, mkdir: true } });
  }

  loggerInstance = pino({ level }, pino.transport({ targets }));
  return loggerInstance;
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env['LOG_LEVEL'];
    loggerInstance = pino({ level: envLevel && envLevel.length > 0 ? envLevel : 'info' });
  }
  return loggerInstance;
}

/** Short form of a title for log lines. */
export function short(title: string, max = 60): string {
  return title.length > max ? `${title.slice(0, max)}…` : title;
}
