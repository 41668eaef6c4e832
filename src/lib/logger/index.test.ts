import { describe, expect, it } from 'vitest';

import { createLogger, type LevelName } from './index';

function capture(options: Parameters<typeof createLogger>[0] = {}) {
  const lines: Array<{ level: LevelName; line: string }> = [];
  const logger = createLogger({ ...options, write: (level, line) => lines.push({ level, line }) });
  return { logger, lines };
}

describe('logger', () => {
  it('drops lines below the minimum level', () => {
    const { logger, lines } = capture({ level: 'warn' });
    logger.info('hidden');
    logger.warn('shown');
    expect(lines.map((l) => l.level)).toEqual(['warn']);
  });

  it('prefixes text lines with service, level and namespace', () => {
    const { logger, lines } = capture({ service: 'rbdx' });
    logger.child('collector').child('site-a').info('scrape done', { emitted: 4 });
    expect(lines[0].line).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[rbdx\] \[INFO\] \[collector:site-a\] scrape done \{"emitted":4\}$/
    );
  });

  it('writes JSON lines with serialised errors', () => {
    const { logger, lines } = capture({ json: true });
    logger.error('boom', { err: new Error('bad things') });
    const parsed = JSON.parse(lines[0].line) as { level: string; msg: string; meta: { err: { message: string; name: string } } };
    expect(parsed.level).toBe('error');
    expect(parsed.msg).toBe('boom');
    expect(parsed.meta.err.message).toBe('bad things');
    expect(parsed.meta.err.name).toBe('Error');
  });

  it('can be switched off', () => {
    const { logger, lines } = capture({ enabled: false });
    logger.error('nothing');
    expect(lines).toEqual([]);
  });
});
