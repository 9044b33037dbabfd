import { describe, test, expect } from '@jest/globals';
import { resolve } from 'path';
import { loadSettings } from '../../../src/config/environment';
import {
  createLogger,
  createModuleLogger,
  findCallSite,
  toPinoLevel,
  type Logger,
} from '../../../src/utils/logger';
import { createCapturingLogger } from '../../helpers/logCapture';

function logFromNamedFunction(logger: Logger): void {
  logger.info('from function');
}

class CallRouter {
  route(logger: Logger): void {
    createModuleLogger(logger, 'router').warn('routed');
  }
}

describe('Logger', () => {
  test('should map configured levels to pino levels', () => {
    expect(toPinoLevel('DEBUG')).toBe('debug');
    expect(toPinoLevel('INFO')).toBe('info');
    expect(toPinoLevel('WARNING')).toBe('warn');
    expect(toPinoLevel('ERROR')).toBe('error');
    expect(toPinoLevel('CRITICAL')).toBe('fatal');
  });

  test('should write json records with timestamp, level, name and message', () => {
    const { logger, records } = createCapturingLogger();

    logger.info({ callId: 'call-1' }, 'hello');

    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record.level).toBe('INFO');
    expect(record.message).toBe('hello');
    expect(record.name).toBe('agentic-ivr-ws');
    expect(record.callId).toBe('call-1');
    expect(record.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(record).not.toHaveProperty('pid');
    expect(record).not.toHaveProperty('hostname');
  });

  test('should label warn and fatal records as WARNING and CRITICAL', () => {
    const { logger, records } = createCapturingLogger();

    logger.warn('careful');
    logger.fatal('down');

    expect(records.map(record => record.level)).toEqual(['WARNING', 'CRITICAL']);
  });

  test('should drop records below the configured level', () => {
    const { logger, records } = createCapturingLogger({ LOG_LEVEL: 'WARNING' });

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(records.map(record => record.message)).toEqual(['warn', 'error']);
  });

  test('should serialize errors with type and stack', () => {
    const { logger, records } = createCapturingLogger();

    logger.error({ err: new TypeError('bad frame') }, 'failed');

    const err = records[0].err;
    expect(err).toMatchObject({ type: 'TypeError', message: 'bad frame' });
    expect(err).toHaveProperty('stack');
  });

  test('should record the calling function and line', () => {
    const { logger, records } = createCapturingLogger();

    logFromNamedFunction(logger);
    new CallRouter().route(logger);

    expect(records[0].function).toBe('logFromNamedFunction');
    expect(records[1].function).toBe('CallRouter.route');
    for (const record of records) {
      expect(typeof record.line).toBe('number');
      expect(record.line).toBeGreaterThan(0);
    }
  });

  test('should skip frames from pino and the logger module when finding the call site', () => {
    const stack = [
      'Error',
      `    at captureCallSite (${resolve(__dirname, '../../../src/utils/logger.ts')}:50:12)`,
      '    at Pino.write (/srv/app/node_modules/pino/lib/proto.js:208:35)',
      '    at Pino.LOG [as info] (/srv/app/node_modules/pino/lib/tools.js:60:21)',
      '    at new Promise (<anonymous>)',
      '    at async EchoSession.handleMessage (/srv/app/src/websocket/echoSession.ts:81:14)',
    ].join('\n');

    expect(findCallSite(stack)).toEqual({ function: 'EchoSession.handleMessage', line: 81 });
  });

  test('should report anonymous callers', () => {
    const stack = ['Error', '    at /srv/app/src/cli.ts:12:3'].join('\n');

    expect(findCallSite(stack)).toEqual({ function: '<anonymous>', line: 12 });
    expect(findCallSite(undefined)).toBeUndefined();
  });

  test('should bind the module name on child loggers', () => {
    const { logger, records } = createCapturingLogger();

    createModuleLogger(logger, 'websocket', { sessionId: 's-1' }).info('opened');

    expect(records[0]).toMatchObject({ module: 'websocket', sessionId: 's-1', message: 'opened' });
  });

  test('should write human-readable lines in text format', () => {
    const chunks: string[] = [];
    const settings = loadSettings({ LOG_FORMAT: 'text' });
    const logger = createLogger(settings, {
      write(chunk: string) {
        chunks.push(chunk);
      },
    });

    logger.info('text mode');

    const output = chunks.join('');
    expect(output).toContain('INFO');
    expect(output).toContain('text mode');
    expect(output).not.toContain('"line"');
    expect(() => JSON.parse(output)).toThrow();
  });

  test('should use the configured level names in text format', () => {
    const chunks: string[] = [];
    const logger = createLogger(loadSettings({ LOG_FORMAT: 'text' }), {
      write(chunk: string) {
        chunks.push(chunk);
      },
    });

    logger.warn('careful');
    logger.fatal('down');

    expect(chunks[0]).toContain('WARNING');
    expect(chunks[1]).toContain('CRITICAL');
  });
});
