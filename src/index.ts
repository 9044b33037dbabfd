export { IvrServer, type IvrServerOptions } from './server';
export {
  loadSettings,
  collectVariables,
  type Settings,
  type LogLevel,
  type LogFormat,
  type DeploymentEnvironment,
} from './config/environment';
export { ECHO_PREFIX, DEFAULT_WS_PATH, HEALTH_PATH } from './config/constants';
export { createApp, buildHealthPayload, type HealthPayload } from './http/app';
export { EchoSession } from './websocket/echoSession';
export { ConnectionManager } from './websocket/connectionManager';
export type {
  CloseReason,
  SessionDetails,
  SessionInfo,
  SessionOutcome,
  SessionState,
} from './websocket/types';
export { createLogger, createModuleLogger, type Logger } from './utils/logger';
export { ConfigurationError, UnsupportedFrameError, type ConfigurationIssue } from './utils/errors';
