import { LogFormatSchema, LogLevelSchema } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const minLevel  = LogLevelSchema.catch('info').parse(process.env['LOG_LEVEL']);
const logFormat = LogFormatSchema.catch('text').parse(process.env['LOG_FORMAT']);

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[minLevel]) return;
  const ts = new Date().toISOString();
  const out = logFormat === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...meta })
    : meta ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(meta)}`
           : `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log('debug', msg, meta),
  info:  (msg: string, meta?: Record<string, unknown>) => log('info',  msg, meta),
  warn:  (msg: string, meta?: Record<string, unknown>) => log('warn',  msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log('error', msg, meta),
};
