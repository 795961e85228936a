/**
 * CLI logger tests
 */

import { describe, it, expect } from 'vitest';
import { createCLILogger } from '../../../cli/lib/logger.js';

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('CLILogger', () => {
  it('drops lines below the configured level', () => {
    const sink = capture();
    const logger = createCLILogger({ level: 'warn', json: true, write: sink.write });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.lines).toHaveLength(1);
    expect(JSON.parse(sink.lines[0] ?? '{}')).toMatchObject({ level: 'warn', message: 'shown' });
  });

  it('tags json lines with the command and its duration', () => {
    const sink = capture();
    const logger = createCLILogger({ level: 'debug', json: true, write: sink.write });

    logger.commandStart('fetch', { indicator: 'CME_MRY0T4' });
    logger.commandEnd(false, { rows: 0 });

    expect(sink.lines).toHaveLength(2);
    expect(JSON.parse(sink.lines[0] ?? '{}')).toMatchObject({
      level: 'debug',
      message: 'Starting fetch',
      service: 'unicef-data',
      command: 'fetch',
      indicator: 'CME_MRY0T4',
    });
    const end: unknown = JSON.parse(sink.lines[1] ?? '{}');
    expect(end).toMatchObject({ level: 'error', message: 'Command failed', command: 'fetch', rows: 0 });
    expect(end).toHaveProperty('duration_ms', expect.any(Number));
  });

  it('writes coloured text with metadata when json is off', () => {
    const sink = capture();
    const logger = createCLILogger({ level: 'info', json: false, write: sink.write });

    logger.info('Loaded', { files: 2 });

    expect(sink.lines).toEqual([
      '\x1b[34mINFO \x1b[0m Loaded \x1b[2m(\x1b[36mfiles\x1b[0m=2)\x1b[0m',
    ]);
  });
});
