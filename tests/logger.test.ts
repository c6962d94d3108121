import { describe, expect, it } from 'vitest';

import { Logger } from '../src/utils/logger.js';

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const { lines, write } = capture();
    const logger = new Logger({ level: 'warn', write });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z warn w\n$/);
  });

  it('appends data as JSON in plain mode', () => {
    const { lines, write } = capture();
    new Logger({ write }).info('graph built', { nodes: 3 });
    expect(lines[0]).toMatch(/ info graph built \{"nodes":3\}\n$/);
  });

  it('writes one JSON object per line in json mode', () => {
    const { lines, write } = capture();
    new Logger({ json: true, write }).error('boom', { code: 2 });
    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject({ level: 'error', message: 'boom', data: { code: 2 } });
  });

  it('writes nothing when silent', () => {
    const { lines, write } = capture();
    new Logger({ level: 'silent', write }).error('hidden');
    expect(lines).toEqual([]);
  });
});
