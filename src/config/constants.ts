import { PACKAGE_VERSION } from '../utils/version';

export const PACKAGE_NAME = 'agentic-ivr-ws';

export const DEFAULT_APP_NAME = 'Agentic AI IVR Demo';
export const DEFAULT_APP_VERSION = PACKAGE_VERSION;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8000;
export const DEFAULT_WS_PATH = '/ws/test';
export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

export const HEALTH_PATH = '/';

export const ECHO_PREFIX = 'Message text was: ';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export const LOG_FORMATS = ['json', 'text'] as const;
export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;

export const CLOSE_CODES = {
  GOING_AWAY: 1001,
} as const;

export const SHUTDOWN_CLOSE_REASON = 'Server shutting down';
