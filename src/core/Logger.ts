import winston from 'winston';
import { loadSettings } from './Config';

export interface LoggerOptions {
  /** Уровень winston (error|warn|info|debug). По умолчанию — logLevel из settings.jsonc. */
  level?: string;
  /** Полностью глушит вывод (используется в тестах). */
  silent?: boolean;
}

export function createLogger(opts: LoggerOptions = {}) {
  const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' });
  const printfFmt = winston.format.printf((info: winston.Logform.TransformableInfo) => {
    const level = String(info.level || '').toUpperCase();
    const ts = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
    const msg = typeof info.message === 'string' ? info.message : JSON.stringify(info.message);
    return `${ts} [${level}] ${msg}`;
  });

  const transports: winston.transport[] = [ new winston.transports.Console() ];

  const logger = winston.createLogger({
    level: opts.level ?? loadSettings().logLevel,
    silent: opts.silent ?? false,
    format: winston.format.combine(timestamp, printfFmt),
    transports,
  });

  return logger;
}

export type AppLogger = ReturnType<typeof createLogger>;
