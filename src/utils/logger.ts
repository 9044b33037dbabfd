import pino from 'pino';
import { prettyFactory } from 'pino-pretty';
import { PACKAGE_NAME } from '../config/constants';
import type { LogLevel, Settings } from '../config/environment';
import { getTransport, PRETTY_OPTIONS } from './getTransport';

export type Logger = pino.Logger;

const PINO_LEVELS: Record<LogLevel, pino.Level> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

// pino label -> label written in json records
const LEVEL_LABELS: Record<string, LogLevel> = {
  trace: 'DEBUG',
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

export function toPinoLevel(level: LogLevel): pino.Level {
  return PINO_LEVELS[level];
}

export interface CallSite {
  function: string;
  line: number;
}

const STACK_FRAME = /^\s*at (?:(?:async )?(.+?) \()?(.+?):(\d+):\d+\)?$/;
const PINO_PATH = /[\\/]node_modules[\\/]pino(?:-[\w-]+)?[\\/]/;
const CALL_SITE_STACK_LIMIT = 25;

/**
 * First stack frame outside this module and pino, i.e. the code that made the log call.
 */
export function findCallSite(stack: string | undefined): CallSite | undefined {
  for (const frame of (stack ?? '').split('\n').slice(1)) {
    const match = STACK_FRAME.exec(frame);
    if (!match) {
      continue;
    }
    const [, functionName, file, line] = match;
    if (file === __filename || PINO_PATH.test(file)) {
      continue;
    }
    return { function: functionName ?? '<anonymous>', line: Number(line) };
  }
  return undefined;
}

function captureCallSite(): CallSite | Record<string, never> {
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = CALL_SITE_STACK_LIMIT;
  try {
    return findCallSite(new Error().stack) ?? {};
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
}

function jsonOptions(settings: Settings): pino.LoggerOptions {
  return {
    level: toPinoLevel(settings.logLevel),
    base: { name: PACKAGE_NAME },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    mixin: captureCallSite,
    formatters: {
      level: label => ({ level: LEVEL_LABELS[label] ?? label.toUpperCase() }),
    },
  };
}

function textOptions(settings: Settings): pino.LoggerOptions {
  return {
    name: PACKAGE_NAME,
    level: toPinoLevel(settings.logLevel),
  };
}

/**
 * Create the process logger for the configured format.
 *
 * Passing a destination writes synchronously to it instead of stdout,
 * which is how tests capture records.
 */
export function createLogger(settings: Settings, destination?: pino.DestinationStream): Logger {
  if (settings.logFormat === 'json') {
    return destination ? pino(jsonOptions(settings), destination) : pino(jsonOptions(settings));
  }

  if (destination) {
    const target = destination;
    const prettify = prettyFactory({ ...PRETTY_OPTIONS, colorize: false });
    return pino(textOptions(settings), {
      write: (line: string) => target.write(prettify(line)),
    });
  }

  return pino({ ...textOptions(settings), transport: getTransport(settings) });
}

export function createModuleLogger(
  parent: Logger,
  module: string,
  bindings: Record<string, unknown> = {}
): Logger {
  return parent.child({ module, ...bindings });
}
