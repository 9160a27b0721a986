import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import winston from 'winston';
import type { AppConfig } from '../config/env.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_LOGS_DIR = path.join(__dirname, '../../logs');
const SILENT = process.env.NODE_ENV === 'test';

// ANSI color codes for better visibility
const colors: Record<string, string> = {
  reset: '\x1b[0m',
  info: '\x1b[36m',    // Cyan
  warn: '\x1b[33m',    // Yellow
  error: '\x1b[31m',   // Red
  debug: '\x1b[35m',   // Magenta
};

const formatRecord = (service: string, info: winston.Logform.TransformableInfo): string => {
  const { timestamp, level, message, tags = [], ...rest } = info;
  return JSON.stringify({
    timestamp,
    service,
    level,
    tags: Array.isArray(tags) ? tags : [tags],
    message,
    data: rest
  });
};

const createServiceLogger = (service: string) =>
  winston.createLogger({
    level: 'debug',
    silent: SILENT,
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
      }),
      winston.format.printf(info => formatRecord(service, info))
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.printf(info => {
          const colorizedLevel = colors[info.level.toLowerCase()] ?? '';
          return `${colorizedLevel}${formatRecord(service, info)}${colors.reset}`;
        })
      })
    ]
  });

const createFileTransport = (filename: string) =>
  new winston.transports.File({ filename, level: 'debug' });

const logger = createServiceLogger('server');
const searchLogger = createServiceLogger('search');

const serviceLogs = [
  { instance: logger, file: 'server.log' },
  { instance: searchLogger, file: 'search.log' }
];
const fileTransports = new Map<winston.Logger, ReturnType<typeof createFileTransport>>();

export type LoggingOptions = Pick<AppConfig, 'logLevel' | 'logToFile'> & { logsDir?: string };

/**
 * Applies the validated level and file flag to the service loggers. Until it
 * runs they log at debug to the console only.
 */
const configureLogging = (options: LoggingOptions) => {
  const logsDir = options.logsDir ?? DEFAULT_LOGS_DIR;
  if (options.logToFile && !fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true, mode: 0o755 });
  }

  for (const { instance, file } of serviceLogs) {
    instance.level = options.logLevel;
    const previous = fileTransports.get(instance);
    if (previous) {
      instance.remove(previous);
      fileTransports.delete(instance);
    }
    if (options.logToFile) {
      const transport = createFileTransport(path.join(logsDir, file));
      instance.add(transport);
      fileTransports.set(instance, transport);
    }
  }
};

// Named events of the polling loops
const logSearch = {
  started: (endpoint: string, details: Record<string, unknown>) => {
    searchLogger.info('Search started', {
      tags: ['search', 'start'],
      endpoint,
      ...details
    });
  },
  polled: (attempt: number, sessionId: string, status: string) => {
    searchLogger.debug('Search polled', {
      tags: ['search', 'poll'],
      attempt,
      sessionId,
      status
    });
  },
  completed: (attempts: number, sessionId: string | undefined) => {
    searchLogger.info('Search completed', {
      tags: ['search', 'complete'],
      attempts,
      sessionId
    });
  },
  exhausted: (attempts: number) => {
    searchLogger.warn('Search attempts exhausted', {
      tags: ['search', 'exhausted'],
      attempts
    });
  },
  banned: (url: string) => {
    searchLogger.error('Banned with captcha', {
      tags: ['search', 'captcha'],
      url
    });
  },
  carRentalPolled: (attempt: number, groupsCount: number, baseline: number | undefined) => {
    searchLogger.debug('Car rental polled', {
      tags: ['car-rental', 'poll'],
      attempt,
      groupsCount,
      baseline
    });
  }
};

export {
  logger,
  logSearch,
  configureLogging
};

export default logger;
