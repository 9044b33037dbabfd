import express, { type Express } from 'express';
import { HEALTH_PATH } from '../config/constants';
import type { Settings } from '../config/environment';
import { createModuleLogger, type Logger } from '../utils/logger';

export interface HealthPayload {
  message: string;
  version: string;
  status: 'healthy';
}

export function buildHealthPayload(settings: Settings): HealthPayload {
  return {
    message: `${settings.appName} is running`,
    version: settings.appVersion,
    status: 'healthy',
  };
}

export function createApp(settings: Settings, logger: Logger): Express {
  const log = createModuleLogger(logger, 'http');
  const app = express();
  app.disable('x-powered-by');

  app.get(HEALTH_PATH, (_req, res) => {
    log.debug('Root endpoint called');
    res.json(buildHealthPayload(settings));
  });

  return app;
}
