/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Redaction of cookies, credentials and captured auth headers
 * - Output to stderr (stdout is reserved for the MCP protocol)
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  url?: string;
  selector?: string;
  technique?: string;
  step?: number;
  operation?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

function levelFromEnv(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs. Captured request headers and stored sessions
 * carry live credentials.
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  'headers["set-cookie"]',
  'headers.authorization',
  'headers.cookie',
  'request_headers.authorization',
  'request_headers.cookie',
  'request_headers["x-csrf-token"]',
  '*.password',
  '*.secret',
  '*.token',
  '*.code',
  '*.value',
  '*.cookies',
  'session.cookies',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'session-capture',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (used by the CLI once configuration is parsed)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Reads the current baseLogger on every call so configureLogger() takes
 * effect for loggers created at module load.
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, error: undefined, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  actuator: new Logger('InputActuator'),
  otp: new Logger('OtpHandler'),
  analyzer: new Logger('PageAnalyzer'),
  orchestrator: new Logger('LoginOrchestrator'),
  capture: new Logger('NetworkCapture'),
  dedup: new Logger('EventDedup'),
  enricher: new Logger('EventEnricher'),
  session: new Logger('SessionStore'),
  browser: new Logger('BrowserManager'),
  recorder: new Logger('Recorder'),
  registry: new Logger('ToolRegistry'),
  server: new Logger('MCPServer'),

  create: (component: string) => new Logger(component),
};

/**
 * Convenience function to log error messages consistently from catch blocks
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
