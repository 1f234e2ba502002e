/**
 * Unit Tests for subsystem logging
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { appendFileSync } from 'node:fs';
import { configureLogging, createSubsystemLogger } from './subsystem.js';

vi.mock('node:fs');

const mockAppendFileSync = vi.mocked(appendFileSync);

function writtenLines(): unknown[] {
  return mockAppendFileSync.mock.calls.map(([, line]) => JSON.parse(String(line)));
}

describe('createSubsystemLogger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    configureLogging({ level: 'info', stderr: false });
  });

  it('should append JSON lines to the log file', () => {
    configureLogging({ level: 'debug', file: '/tmp/boardtop-test.log', stderr: false });

    createSubsystemLogger('board/test').info('collectors ready', { model: 'Test Orin Board' });

    expect(mockAppendFileSync).toHaveBeenCalledTimes(1);
    expect(mockAppendFileSync.mock.calls[0]?.[0]).toBe('/tmp/boardtop-test.log');
    expect(writtenLines()[0]).toMatchObject({
      level: 'INFO',
      args: ['collectors ready', { model: 'Test Orin Board' }],
    });
  });

  it('should drop records below the configured level', () => {
    configureLogging({ level: 'warn', file: '/tmp/boardtop-test.log', stderr: false });
    const log = createSubsystemLogger('board/test');

    log.debug('pseudo-file unavailable');
    log.info('collectors ready');
    log.error('dashboard tick failed');

    expect(writtenLines()).toMatchObject([{ level: 'ERROR', args: ['dashboard tick failed'] }]);
  });

  it('should pick up configuration changes in existing loggers', () => {
    const log = createSubsystemLogger('board/test');
    log.warn('before');

    configureLogging({ level: 'info', file: '/tmp/boardtop-test.log', stderr: false });
    log.warn('after');

    expect(writtenLines()).toMatchObject([{ level: 'WARN', args: ['after'] }]);
  });

  it('should stop writing to a log file after the first failure', () => {
    mockAppendFileSync.mockImplementationOnce(() => {
      throw Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
    });
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    configureLogging({ level: 'info', file: '/missing/boardtop.log', stderr: false });
    const log = createSubsystemLogger('board/test');

    expect(() => log.warn('first')).not.toThrow();
    log.warn('second');

    expect(mockAppendFileSync).toHaveBeenCalledTimes(1);
    expect(consoleError).not.toHaveBeenCalled();
    consoleError.mockRestore();
  });

  it('should report a failing log file once on stderr when mirroring', () => {
    mockAppendFileSync.mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied');
    });
    const stderrWrite = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    configureLogging({ level: 'info', file: '/root/boardtop.log', stderr: true });

    createSubsystemLogger('board/test').warn('first');

    expect(stderrWrite.mock.calls[0]?.[0]).toBe('boardtop: log file /root/boardtop.log disabled: EACCES: permission denied\n');
    expect(String(stderrWrite.mock.calls[1]?.[0])).toContain('"args":["first"]');
    stderrWrite.mockRestore();
  });

  it('should write nothing without a file or stderr', () => {
    configureLogging({ level: 'debug', stderr: false });

    createSubsystemLogger('board/test').error('dropped');

    expect(mockAppendFileSync).not.toHaveBeenCalled();
  });
});
