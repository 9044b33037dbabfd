import { createServer, type IncomingMessage, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { WebSocketServer, type WebSocket } from 'ws';
import { CLOSE_CODES, SHUTDOWN_CLOSE_REASON } from './config/constants';
import type { Settings } from './config/environment';
import { createApp } from './http/app';
import { createModuleLogger, type Logger } from './utils/logger';
import { ConnectionManager } from './websocket/connectionManager';
import { EchoSession } from './websocket/echoSession';
import type { SessionOutcome } from './websocket/types';

export interface IvrServerOptions {
  onSessionClosed?: (outcome: SessionOutcome) => void;
}

/**
 * HTTP + WebSocket server
 * Serves the health route and runs one echo session per WebSocket upgrade
 */
export class IvrServer {
  private readonly log: Logger;
  private readonly connections: ConnectionManager;
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly settings: Settings,
    private readonly logger: Logger,
    private readonly options: IvrServerOptions = {}
  ) {
    this.log = createModuleLogger(logger, 'server');
    this.connections = new ConnectionManager(logger);
  }

  get connectionManager(): ConnectionManager {
    return this.connections;
  }

  /**
   * Bind the configured host. `port` overrides the configured port (0 picks a free one).
   */
  async start(port: number = this.settings.port): Promise<AddressInfo> {
    if (this.httpServer) {
      throw new Error('Server already started');
    }

    const { settings } = this;
    this.log.info(
      {
        appName: settings.appName,
        version: settings.appVersion,
        environment: settings.environment,
        host: settings.host,
        port,
        wsPath: settings.wsPath,
        logLevel: settings.logLevel,
        logFormat: settings.logFormat,
      },
      'Application starting'
    );

    const httpServer = createServer(createApp(settings, this.logger));
    const wss = new WebSocketServer({ server: httpServer, path: settings.wsPath });
    wss.on('connection', (socket, request) => this.handleConnection(socket, request));
    wss.on('error', error => this.log.error({ err: error }, 'WebSocket server error'));

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          httpServer.off('listening', onListening);
          reject(error);
        };
        const onListening = () => {
          httpServer.off('error', onError);
          resolve();
        };
        httpServer.once('error', onError);
        httpServer.once('listening', onListening);
        httpServer.listen(port, settings.host);
      });
    } catch (error) {
      wss.close();
      throw error;
    }

    this.httpServer = httpServer;
    this.wss = wss;

    const address = this.address();
    this.log.info(
      { host: address.address, port: address.port, wsPath: settings.wsPath },
      'Server listening'
    );
    return address;
  }

  address(): AddressInfo {
    const address = this.httpServer?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    return address;
  }

  /**
   * Close every session, then the listeners. Overlapping calls share one shutdown.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const { httpServer, wss } = this;
    if (!httpServer || !wss) {
      return;
    }

    this.log.info('Initiating graceful shutdown');
    this.connections.beginShutdown();

    const activeSessions = this.connections.activeCount();
    if (activeSessions > 0) {
      this.log.info({ activeSessions }, 'Closing active WebSocket connections');
      const closedCount = await this.connections.closeAll(this.settings.shutdownGraceMs);
      this.log.info({ closedCount }, 'WebSocket connections closed');
    }

    await new Promise<void>((resolve, reject) => {
      wss.close(error => (error ? reject(error) : resolve()));
    });
    await new Promise<void>((resolve, reject) => {
      httpServer.close(error => (error ? reject(error) : resolve()));
    });

    this.httpServer = null;
    this.wss = null;
    this.log.info('Application shutting down');
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    if (this.connections.isShuttingDown()) {
      this.log.debug('Rejecting WebSocket connection during shutdown');
      socket.close(CLOSE_CODES.GOING_AWAY, SHUTDOWN_CLOSE_REASON);
      return;
    }

    const session = this.connections.register(socket, {
      clientHost: request.socket.remoteAddress ?? 'unknown',
      clientPort: request.socket.remotePort ?? 0,
      path: request.url ?? this.settings.wsPath,
      userAgent: request.headers['user-agent'],
    });

    new EchoSession(socket, session, this.logger)
      .run()
      .then(outcome => {
        this.connections.unregister(outcome.sessionId);
        this.log.debug({ ...outcome }, 'Session ended');
        this.options.onSessionClosed?.(outcome);
      })
      .catch(error => {
        this.log.error({ err: error, sessionId: session.sessionId }, 'Session bookkeeping failed');
      });
  }
}
