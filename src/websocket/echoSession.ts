import WebSocket from 'ws';
import { ECHO_PREFIX } from '../config/constants';
import { describeError, UnsupportedFrameError } from '../utils/errors';
import { createModuleLogger, type Logger } from '../utils/logger';
import type { CloseReason, SessionInfo, SessionOutcome, SessionState } from './types';

export function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Echoes every text frame of one connection back with a fixed prefix.
 *
 * The session moves connecting -> open -> closed exactly once. A peer close
 * ends it as `graceful`; a socket error or a binary frame ends it as `fault`
 * and the socket is dropped without a reply.
 */
export class EchoSession {
  private state: SessionState = 'connecting';
  private messagesEchoed = 0;
  private completion: Promise<SessionOutcome> | null = null;
  private resolveOutcome: ((outcome: SessionOutcome) => void) | null = null;
  private readonly log: Logger;

  constructor(
    private readonly socket: WebSocket,
    private readonly session: SessionInfo,
    logger: Logger
  ) {
    this.log = createModuleLogger(logger, 'websocket', {
      sessionId: session.sessionId,
      clientHost: session.clientHost,
      clientPort: session.clientPort,
    });
  }

  get currentState(): SessionState {
    return this.state;
  }

  run(): Promise<SessionOutcome> {
    if (this.completion) {
      return this.completion;
    }

    this.completion = new Promise<SessionOutcome>(resolve => {
      this.resolveOutcome = resolve;
    });

    this.socket.on('message', (data, isBinary) => this.handleMessage(data, isBinary));
    this.socket.on('close', (code, reason) => this.handleClose(code, reason));
    this.socket.on('error', error => this.fail(error));

    this.state = 'open';
    this.log.info({ path: this.session.path }, 'WebSocket connection established');

    return this.completion;
  }

  private handleMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (this.state !== 'open') {
      return;
    }

    if (isBinary) {
      this.fail(new UnsupportedFrameError('binary'));
      return;
    }

    const content = rawDataToText(data);
    this.log.debug({ content, messageLength: content.length }, 'Received WebSocket message');

    if (this.socket.readyState !== WebSocket.OPEN) {
      this.log.debug('Dropping message received while the connection is closing');
      return;
    }

    const response = `${ECHO_PREFIX}${content}`;
    this.socket.send(response, error => {
      if (error) {
        this.fail(error);
        return;
      }
      this.messagesEchoed += 1;
      this.log.debug({ responseLength: response.length }, 'Sent WebSocket response');
    });
  }

  private handleClose(code: number, reason: Buffer): void {
    if (this.state === 'closed') {
      return;
    }

    const reasonText = reason.toString('utf8');
    this.log.info({ code, reason: reasonText }, 'WebSocket client disconnected');
    this.finish({ kind: 'graceful', code, reason: reasonText });
  }

  private fail(error: Error): void {
    if (this.state === 'closed') {
      return;
    }

    const { errorType, message } = describeError(error);
    this.log.error({ err: error, errorType }, 'WebSocket error occurred');
    this.socket.terminate();
    this.finish({ kind: 'fault', errorType, message });
  }

  private finish(reason: CloseReason): void {
    this.state = 'closed';
    this.resolveOutcome?.({
      sessionId: this.session.sessionId,
      messagesEchoed: this.messagesEchoed,
      reason,
    });
    this.resolveOutcome = null;
  }
}
