/**
 * Winston logger configuration
 */
import winston from 'winston';
import path from 'path';
import fs from 'fs-extra';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

/**
 * Logger options
 */
export interface LoggerOptions {
  level: string;
  format: 'json' | 'simple';
  toFile: boolean;
  toConsole: boolean;
  logsPath: string;
  moduleFilter?: string[];
}

/**
 * Allowed modules for logging (populated from config)
 */
let allowedModules: Set<string> | null = null;

/**
 * Safe JSON stringify that handles circular references and errors
 */
function safeStringify(obj: unknown, indent: number = 2): string {
  const seen = new WeakSet<object>();

  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value === null || value === undefined) {
      return value;
    }

    if (value instanceof Error) {
      const errorObj: Record<string, unknown> = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
      if (value.cause) {
        errorObj.cause = value.cause;
      }
      return errorObj;
    }

    // Float32Array chunks would dump every sample
    if (ArrayBuffer.isView(value)) {
      return `[${value.constructor.name} ${value.byteLength} bytes]`;
    }

    if (typeof value === 'object') {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  }, indent);
}

/**
 * Custom filter format to filter logs by module context
 */
const moduleFilter = winston.format((info) => {
  if (!allowedModules || allowedModules.size === 0) {
    return info;
  }

  if (typeof info.context === 'string' && !allowedModules.has(info.context)) {
    return false;
  }

  // Root logger has no context
  return info;
});

/**
 * Flow-control transition attached to a log entry as metadata. The real-time
 * path logs these once per transition, never per callback.
 */
export interface FlowTransition {
  flow: 'overrun' | 'recovered' | 'pause' | 'resume';
  /** Handoff queue depth */
  handoff?: number;
  inFlight?: number;
  /** Samples offered by the host callback that overran */
  offered?: number;
  /** Free ring capacity at that moment */
  free?: number;
}

const FLOW_FIELDS: Array<[string, string]> = [
  ['handoff', 'handoff'],
  ['inFlight', 'in-flight'],
  ['offered', 'offered'],
  ['free', 'free'],
];

/**
 * Fold flow-control fields into one compact tag, leaving other metadata as is
 */
export function describeFlow(meta: Record<string, unknown>): { summary: string; rest: Record<string, unknown> } {
  const { flow, ...rest } = meta;
  if (typeof flow !== 'string') {
    return { summary: '', rest: meta };
  }

  const parts = [`flow=${flow}`];
  for (const [field, label] of FLOW_FIELDS) {
    const value = rest[field];
    if (typeof value === 'number') {
      parts.push(`${label}=${value}`);
      delete rest[field];
    }
  }
  return { summary: `<${parts.join(' ')}>`, rest };
}

/**
 * Custom log format for console output
 */
const consoleFormat = printf(({ level, message, timestamp, context, ...meta }) => {
  const contextStr = context ? `[${String(context)}]` : '';
  const { summary, rest } = describeFlow(meta);
  const flowStr = summary ? ` ${summary}` : '';
  const metaStr = Object.keys(rest).length ? safeStringify(rest, 2) : '';
  return `${String(timestamp)} [${level}]${contextStr}: ${String(message)}${flowStr} ${metaStr}`;
});

/**
 * Create logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    allowedModules = new Set(options.moduleFilter);
  } else {
    allowedModules = null;
  }

  if (options.toConsole) {
    transports.push(
      new winston.transports.Console({
        format: combine(
          moduleFilter(),
          colorize(),
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
          errors({ stack: true }),
          consoleFormat
        ),
      })
    );
  }

  if (options.toFile) {
    fs.ensureDirSync(options.logsPath);

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'error.log'),
        level: 'error',
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          json()
        ),
      })
    );

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logsPath, 'combined.log'),
        format: combine(
          moduleFilter(),
          timestamp(),
          errors({ stack: true }),
          options.format === 'json' ? json() : consoleFormat
        ),
      })
    );
  }

  // Winston warns on a logger without transports; tests run that way
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: options.level,
    transports,
    exitOnError: false,
  });
}

let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the default logger
 */
export function initLogger(options: LoggerOptions): void {
  loggerInstance = createLogger(options);

  if (options.moduleFilter && options.moduleFilter.length > 0) {
    loggerInstance.info(`Log filtering enabled for modules: ${options.moduleFilter.join(', ')}`);
  } else {
    loggerInstance.debug('Log filtering disabled - showing all modules');
  }
}

/**
 * Get the logger instance
 * @throws Error if logger not initialized
 */
export function getLogger(): winston.Logger {
  if (!loggerInstance) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return loggerInstance;
}
