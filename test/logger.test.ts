import { afterEach, describe, expect, it } from 'vitest';

import { configureLogger, getLogger, resetLogger } from '../src/logger.js';

afterEach(() => {
  resetLogger();
});

describe('logger', () => {
  it('writes JSON lines with the service name and an ISO timestamp', () => {
    const lines: string[] = [];
    configureLogger({ level: 'info', destination: { write: (line: string) => void lines.push(line) } });

    getLogger().debug('hidden');
    getLogger().info({ url: 'https://example.com/' }, 'fetched');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 30,
      service: 'seedcrawl',
      url: 'https://example.com/',
      msg: 'fetched',
    });
    expect(entry).toHaveProperty('time', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });

  it('is silent until configured', () => {
    const lines: string[] = [];
    configureLogger({ destination: { write: (line: string) => void lines.push(line) } });

    getLogger().error('nobody hears this');

    expect(lines).toEqual([]);
  });
});
