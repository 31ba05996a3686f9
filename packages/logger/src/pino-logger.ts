import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv } from './env.schema.js';

const env = validateLoggerEnv(process.env);

/**
 * Pads or truncates a category to a fixed width so pretty-printed lines align.
 * Long labels keep their tail, prefixed by a horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

interface TransportMode {
  console: boolean;
  file: boolean;
}

// The CLI switches console output off in --json mode
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

function isTestEnvironment(): boolean {
  // vitest may set these after this module has been evaluated
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (transportMode.console) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '{categoryLabel} | {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      targets.push({
        level: 'trace',
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (transportMode.file) {
    const logDir = path.resolve(env.LOGGER_FILE_LOG_DIRNAME);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    targets.push({
      level: 'trace',
      options: {
        destination: path.join(logDir, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets();
  if (targets.length === 0) {
    // Nothing enabled: keep the level filtering but drop every line
    return pino.pino({ ...pinoConfig, enabled: false });
  }

  pinoConfig.transport = { targets };
  return pino.pino(pinoConfig);
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 20),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that follows transport reconfiguration.
 *
 * Modules create their loggers at top level, before the CLI has parsed its
 * flags, so the returned proxy resolves the underlying pino child on every
 * property access instead of capturing it once.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update transport mode at runtime. Cached loggers are discarded so the next
 * call through any proxy picks up the new transports.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerTransports(): Readonly<TransportMode> {
  return transportMode;
}
