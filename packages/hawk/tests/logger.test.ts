import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/logger.js';

function capture(level = 'debug') {
  const lines: string[] = [];
  const log = createLogger({ level, destination: { write: (msg: string) => lines.push(msg) } });
  const records = (): Array<Record<string, unknown>> =>
    lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { log, records };
}

describe('createLogger', () => {
  it('writes the level as a label', () => {
    const { log, records } = capture();
    log.info('hello');
    expect(records()[0]).toMatchObject({ level: 'info', name: 'hawkline', msg: 'hello' });
  });

  it('redacts authorization headers and bewits', () => {
    const { log, records } = capture();
    log.debug(
      { headers: { authorization: 'Hawk id="a", mac="b"' }, bewit: 'token', id: 'a' },
      'rejected'
    );
    expect(records()[0]).toMatchObject({
      headers: { authorization: '[REDACTED]' },
      bewit: '[REDACTED]',
      id: 'a',
    });
  });

  it('redacts secrets nested one level deep', () => {
    const { log, records } = capture();
    log.info({ credentials: { id: 'a', secret: 'test-secret' } }, 'loaded');
    expect(records()[0]).toMatchObject({ credentials: { id: 'a', secret: '[REDACTED]' } });
  });

  it('drops records below the configured level', () => {
    const { log, records } = capture('info');
    log.debug('quiet');
    expect(records()).toEqual([]);
  });
});
