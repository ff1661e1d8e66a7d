import assert from 'node:assert/strict';
import { Writable } from 'node:stream';
import { test } from 'node:test';
import { createLogger, isLogLevel, silentLogger } from '../logger';

function captureStream(lines: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString('utf8'));
      callback();
    }
  });
}

test('createLogger writes json lines at or above the configured level', () => {
  const lines: string[] = [];
  const logger = createLogger({ level: 'warn', name: 'hcloud-test', destination: captureStream(lines) });
  logger.info('ignored');
  logger.warn({ path: '/servers' }, 'slow request');

  assert.equal(lines.length, 1);
  const entry = JSON.parse(lines[0]);
  assert.equal(entry.msg, 'slow request');
  assert.equal(entry.path, '/servers');
  assert.equal(entry.name, 'hcloud-test');
  assert.equal(entry.level, 40);
  assert.equal(entry.pid, undefined);
  assert.equal(typeof entry.time, 'string');
});

test('isLogLevel accepts pino levels only', () => {
  assert.equal(isLogLevel('debug'), true);
  assert.equal(isLogLevel('silent'), true);
  assert.equal(isLogLevel('verbose'), false);
});

test('silentLogger is disabled', () => {
  assert.equal(silentLogger.isLevelEnabled('fatal'), false);
});
