import * as winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type Logger = winston.Logger;

let rootLogger: winston.Logger | null = null;

function buildRootLogger(level: LogLevel): winston.Logger {
  return winston.createLogger({
    level,
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, scope, ...meta }) => {
        const scopeStr = typeof scope === 'string' ? ` [${scope}]` : '';
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${level}]${scopeStr} ${String(message)}${metaStr}`;
      })
    ),
    // stdout belongs to the MCP stdio transport
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
    exitOnError: false,
  });
}

/**
 * Set the level of every logger handed out by `createLogger`
 */
export function configureLogging(level: LogLevel): void {
  if (rootLogger) {
    rootLogger.level = level;
  } else {
    rootLogger = buildRootLogger(level);
  }
}

/**
 * Child logger tagging every line with `[scope]`
 */
export function createLogger(scope: string): Logger {
  if (!rootLogger) {
    rootLogger = buildRootLogger('info');
  }
  return rootLogger.child({ scope });
}
