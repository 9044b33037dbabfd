import type pino from 'pino';
import type { Settings } from '../config/environment';

const STDOUT_DESTINATION = 1;

// Same level names as json records
export const PRETTY_OPTIONS = {
  translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
  ignore: 'pid,hostname',
  customLevels: 'TRACE:10,DEBUG:20,INFO:30,WARNING:40,ERROR:50,CRITICAL:60',
  customColors: 'TRACE:gray,DEBUG:blue,INFO:green,WARNING:yellow,ERROR:red,CRITICAL:bgRed',
} as const;

/**
 * Text format goes through pino-pretty; json format is written by pino
 * directly to stdout, so no transport is needed.
 */
export function getTransport(settings: Settings): pino.TransportSingleOptions | undefined {
  if (settings.logFormat !== 'text') {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      ...PRETTY_OPTIONS,
      colorize: settings.environment === 'development',
      destination: STDOUT_DESTINATION,
    },
  };
}
