import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import WebSocket from 'ws';
import { ConnectionManager } from '../../../src/websocket/connectionManager';
import { createCapturingLogger, type CapturedRecord } from '../../helpers/logCapture';
import { waitForClose } from '../../helpers/wsClient';
import { WsFixture } from '../../helpers/wsFixture';

const DETAILS = { clientHost: '127.0.0.1', clientPort: 50000, path: '/ws/test' };

describe('ConnectionManager', () => {
  let fixture: WsFixture;
  let manager: ConnectionManager;
  let records: CapturedRecord[];

  beforeEach(async () => {
    const capture = createCapturingLogger();
    records = capture.records;
    manager = new ConnectionManager(capture.logger);
    fixture = new WsFixture();
    await fixture.start();
  });

  afterEach(async () => {
    await fixture.stop();
  });

  test('should register sessions with unique ids', async () => {
    const first = manager.register((await fixture.connect()).server, DETAILS);
    const second = manager.register((await fixture.connect()).server, { ...DETAILS, clientPort: 50001 });

    expect(first.sessionId).not.toBe(second.sessionId);
    expect(first).toMatchObject({ ...DETAILS, metadata: {} });
    expect(first.connectedAt).toBeInstanceOf(Date);
    expect(manager.activeCount()).toBe(2);
    expect(manager.list().map(info => info.clientPort)).toEqual([50000, 50001]);
  });

  test('should look up and unregister sessions', async () => {
    const info = manager.register((await fixture.connect()).server, DETAILS);

    expect(manager.get(info.sessionId)).toBe(info);
    expect(manager.unregister(info.sessionId)).toBe(true);
    expect(manager.unregister(info.sessionId)).toBe(false);
    expect(manager.get(info.sessionId)).toBeUndefined();
    expect(manager.activeCount()).toBe(0);
  });

  test('should merge metadata updates', async () => {
    const info = manager.register((await fixture.connect()).server, DETAILS);

    manager.updateMetadata(info.sessionId, { callSid: 'CA-test' });
    manager.updateMetadata(info.sessionId, { streamSid: 'MZ-test' });
    manager.updateMetadata('missing', { ignored: true });

    expect(manager.get(info.sessionId)?.metadata).toEqual({
      callSid: 'CA-test',
      streamSid: 'MZ-test',
    });
  });

  test('should enter shutdown mode once', () => {
    expect(manager.isShuttingDown()).toBe(false);

    manager.beginShutdown();
    manager.beginShutdown();

    expect(manager.isShuttingDown()).toBe(true);
    const shutdownRecords = records.filter(
      record => record.message === 'Connection manager entering shutdown mode - rejecting new connections'
    );
    expect(shutdownRecords).toHaveLength(1);
  });

  test('should close every session with going-away code', async () => {
    const first = await fixture.connect();
    const second = await fixture.connect();
    manager.register(first.server, DETAILS);
    manager.register(second.server, DETAILS);
    const closes = Promise.all([waitForClose(first.client), waitForClose(second.client)]);

    const closedCount = await manager.closeAll(1000);

    expect(closedCount).toBe(2);
    expect(manager.activeCount()).toBe(0);
    expect(await closes).toEqual([
      { code: 1001, reason: 'Server shutting down' },
      { code: 1001, reason: 'Server shutting down' },
    ]);
  });

  test('should terminate sockets that do not finish the close handshake', async () => {
    const { client, server } = await fixture.connect();
    manager.register(server, DETAILS);
    // Stop reading so the close frame is never answered
    client.pause();

    const closedCount = await manager.closeAll(50);

    expect(closedCount).toBe(1);
    await waitForClose(server);
    expect(server.readyState).toBe(WebSocket.CLOSED);
  });

  test('should resolve zero when nothing is open', async () => {
    await expect(manager.closeAll(50)).resolves.toBe(0);
  });
});
