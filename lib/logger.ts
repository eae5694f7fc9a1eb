import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level: string;
  format?: 'pretty' | 'json';
  /**
   * Send every level to stderr, leaving stdout for command output.
   */
  stderr?: boolean;
  silent?: boolean;
}

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Create a logger tagged with the component it belongs to.
 */
export function createLogger(component: string, options: LoggerOptions): Logger {
  const base = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.splat()
  );

  const consoleFormat =
    options.format === 'json'
      ? winston.format.json()
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, component: name, ...rest }) => {
            const meta = Object.keys(rest).length ? JSON.stringify(rest) : '';
            return `${timestamp} [${name}] ${level}: ${message} ${meta}`.trimEnd();
          })
        );

  return winston.createLogger({
    levels,
    level: options.level,
    silent: options.silent ?? false,
    format: base,
    defaultMeta: { component },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: options.stderr ? Object.keys(levels) : [],
      }),
    ],
  });
}
