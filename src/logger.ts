/**
 * Structured logging with pino.
 *
 * Crawl runs are long batch jobs, so logs go to stderr (stdout carries the
 * CLI's page lines) or, with LOG_FILE set, to a file. Environment:
 *
 *   LOG_LEVEL  trace|debug|info|warn|error|fatal, case-insensitive (default info)
 *   LOG_FILE   append JSON lines to this path instead of stderr
 *   NODE_ENV   "development" pretty-prints to stderr when pino-pretty resolves
 */
import { createRequire } from 'node:module';
import pino, { type Logger, type LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

const SERVICE_NAME = 'campus-crawler';
const STDERR_FD = 2;

const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

/** Where log lines go: a file path, pretty stderr, or JSON on stderr. */
export type LogTarget =
  | { kind: 'file'; path: string }
  | { kind: 'pretty' }
  | { kind: 'stderr' };

function prettyResolves(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

export function resolveLogTarget(
  env: NodeJS.ProcessEnv,
  canPretty: () => boolean = prettyResolves
): LogTarget {
  if (env.LOG_FILE) return { kind: 'file', path: env.LOG_FILE };
  if (env.NODE_ENV === 'development' && canPretty()) return { kind: 'pretty' };
  return { kind: 'stderr' };
}

export function buildLoggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  return {
    level: resolveLogLevel(env.LOG_LEVEL),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: { service: SERVICE_NAME },
  };
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const options = buildLoggerOptions(env);
  const target = resolveLogTarget(env);

  switch (target.kind) {
    case 'pretty':
      return pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,service',
            destination: STDERR_FD,
          },
        },
      });
    case 'file':
      return pino(options, pino.destination({ dest: target.path, mkdir: true, append: true }));
    case 'stderr':
      return pino(options, pino.destination(STDERR_FD));
  }
}

export const logger = createLogger();
