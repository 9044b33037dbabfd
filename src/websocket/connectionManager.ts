import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';
import { CLOSE_CODES, SHUTDOWN_CLOSE_REASON } from '../config/constants';
import { describeError } from '../utils/errors';
import { createModuleLogger, type Logger } from '../utils/logger';
import type { SessionDetails, SessionInfo } from './types';

interface TrackedSession {
  info: SessionInfo;
  socket: WebSocket;
}

function waitForClose(socket: WebSocket, graceMs: number): Promise<void> {
  if (socket.readyState === WebSocket.CLOSED) {
    return Promise.resolve();
  }

  return new Promise(resolve => {
    const timer = setTimeout(() => {
      socket.terminate();
      resolve();
    }, graceMs);

    socket.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
  });
}

/**
 * Registry of open WebSocket sessions, used for shutdown.
 * Echo sessions never exchange data through it.
 */
export class ConnectionManager {
  private readonly sessions = new Map<string, TrackedSession>();
  private shuttingDown = false;
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = createModuleLogger(logger, 'connections');
  }

  register(socket: WebSocket, details: SessionDetails): SessionInfo {
    const info: SessionInfo = {
      ...details,
      sessionId: randomUUID(),
      connectedAt: new Date(),
      metadata: {},
    };
    this.sessions.set(info.sessionId, { info, socket });

    this.log.debug(
      { sessionId: info.sessionId, activeSessions: this.sessions.size },
      'Session registered'
    );
    return info;
  }

  unregister(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      this.log.debug({ sessionId, activeSessions: this.sessions.size }, 'Session removed');
    }
    return removed;
  }

  get(sessionId: string): SessionInfo | undefined {
    return this.sessions.get(sessionId)?.info;
  }

  list(): SessionInfo[] {
    return [...this.sessions.values()].map(tracked => tracked.info);
  }

  updateMetadata(sessionId: string, metadata: Record<string, unknown>): void {
    const tracked = this.sessions.get(sessionId);
    if (tracked) {
      tracked.info.metadata = { ...tracked.info.metadata, ...metadata };
    }
  }

  activeCount(): number {
    return this.sessions.size;
  }

  beginShutdown(): void {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.log.info('Connection manager entering shutdown mode - rejecting new connections');
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Close every tracked socket with 1001, terminating those still open after
   * `graceMs`. Resolves the number of sockets the close frame was sent to.
   */
  async closeAll(graceMs: number): Promise<number> {
    const tracked = [...this.sessions.values()];
    let closedCount = 0;
    const pending: Promise<void>[] = [];

    for (const { info, socket } of tracked) {
      try {
        socket.close(CLOSE_CODES.GOING_AWAY, SHUTDOWN_CLOSE_REASON);
        closedCount += 1;
        pending.push(waitForClose(socket, graceMs));
      } catch (error) {
        this.log.warn(
          { sessionId: info.sessionId, err: error, errorType: describeError(error).errorType },
          'Error closing WebSocket'
        );
        socket.terminate();
      } finally {
        this.unregister(info.sessionId);
      }
    }

    await Promise.all(pending);
    return closedCount;
  }
}
