/**
 * Logger Tests
 *
 * Level filtering, line format and the injectable sink that keeps
 * diagnostics off stdout.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, stderrSink, type LogLevel } from '../../../core/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function capture(level: LogLevel): { logger: Logger; lines: [string, string][] } {
    const lines: [string, string][] = [];
    const logger = new Logger({
      level,
      service: 'unicef-data',
      pretty: false,
      write: (lineLevel, line) => lines.push([lineLevel, line]),
    });
    return { logger, lines };
  }

  it('drops lines below the configured level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('Requesting page');
    logger.info('Indicator fetched');
    logger.warn('Retries exhausted');

    expect(lines.map(([level]) => level)).toEqual(['warn']);
  });

  it('writes JSON lines with metadata', () => {
    const { logger, lines } = capture('debug');
    logger.info('Indicator fetched', { rows: 3 });

    const [level, line] = lines[0] ?? ['', '{}'];
    expect(level).toBe('info');
    expect(JSON.parse(line)).toMatchObject({
      level: 'info',
      service: 'unicef-data',
      message: 'Indicator fetched',
      rows: 3,
    });
  });

  it('passes the sink on to child loggers', () => {
    const { logger, lines } = capture('debug');
    logger.child('fetch').debug('Requesting page');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]?.[1] ?? '{}')).toMatchObject({ service: 'unicef-data:fetch' });
  });

  it('sends every level to stderr through stderrSink', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const info = vi.spyOn(console, 'info');
    const debug = vi.spyOn(console, 'debug');
    const logger = new Logger({ level: 'debug', service: 'unicef-data', pretty: true, write: stderrSink });

    logger.debug('Requesting page');
    logger.info('Indicator fetched');

    const written = stderr.mock.calls.map(([chunk]) => String(chunk));
    expect(written.filter((line) => line.includes('unicef-data: Requesting page'))).toHaveLength(1);
    expect(written.filter((line) => line.includes('unicef-data: Indicator fetched'))).toHaveLength(1);
    expect(info).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();
  });
});
