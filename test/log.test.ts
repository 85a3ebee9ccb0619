import { describe, expect, it } from 'vitest';
import { createLogger } from '../src/log.js';

const clock = () => new Date('2025-01-01T00:00:00.000Z');

function capture(level: Parameters<typeof createLogger>[0], scope?: string) {
  const lines: Array<[string, string]> = [];
  const logger = createLogger(level, { scope, clock, sink: (lvl, line) => lines.push([lvl, line]) });
  return { logger, lines };
}

describe('createLogger', () => {
  it('drops messages above the threshold', () => {
    const { logger, lines } = capture('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(lines).toEqual([
      ['warn', '2025-01-01T00:00:00.000Z WARN w'],
      ['error', '2025-01-01T00:00:00.000Z ERROR e'],
    ]);
  });

  it('formats string and object metadata with the scope', () => {
    const { logger, lines } = capture('info', 'cli');
    logger.info('hello', { a: 1 });
    logger.info('plain', 'extra');
    expect(lines.map(([, l]) => l)).toEqual([
      '2025-01-01T00:00:00.000Z INFO [cli] hello {"a":1}',
      '2025-01-01T00:00:00.000Z INFO [cli] plain extra',
    ]);
  });

  it('marks metadata that cannot be serialized', () => {
    const { logger, lines } = capture('info');
    const loop: { self?: unknown } = {};
    loop.self = loop;
    logger.info('cycle', loop);
    expect(lines[0]?.[1]).toBe('2025-01-01T00:00:00.000Z INFO cycle [meta-unserializable]');
  });

  it('silent logs nothing', () => {
    const { logger, lines } = capture('silent');
    logger.error('nope');
    expect(lines).toEqual([]);
  });
});
