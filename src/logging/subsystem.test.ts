import { describe, it, expect, afterEach } from 'vitest';
import { pino } from 'pino';
import { createSubsystemLogger } from './subsystem.js';
import { configureLogging, setLogger } from '../logger.js';

function captureLogger(lines: string[]) {
  return pino({ level: 'debug', base: undefined }, {
    write: (msg: string) => {
      lines.push(msg);
    },
  });
}

describe('createSubsystemLogger', () => {
  afterEach(() => {
    configureLogging({});
  });

  it('should tag entries with the subsystem and merge metadata', () => {
    const lines: string[] = [];
    setLogger(captureLogger(lines));
    const log = createSubsystemLogger('fan/control-loop');

    log.warn('Fan command failed, retrying', { attempt: 1 });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 40,
      subsystem: 'fan/control-loop',
      msg: 'Fan command failed, retrying',
      attempt: 1,
    });
  });

  it('should follow the root logger when it is replaced', () => {
    const first: string[] = [];
    const second: string[] = [];
    const log = createSubsystemLogger('cli');

    setLogger(captureLogger(first));
    log.info('one');
    setLogger(captureLogger(second));
    log.info('two');

    expect(first.map(line => JSON.parse(line).msg)).toEqual(['one']);
    expect(second.map(line => JSON.parse(line).msg)).toEqual(['two']);
  });
});
