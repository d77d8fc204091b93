import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger, stripAnsi, type LogEntry } from '../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    logger.setLevel('info');
    logger.removeLogSink('run-a');
    vi.restoreAllMocks();
  });

  it('strips colour codes', () => {
    expect(stripAnsi('\x1b[32mSUCCESS\x1b[0m done')).toBe('SUCCESS done');
  });

  it('drops messages below the threshold', () => {
    const print = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.setLevel('warn');

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(print).toHaveBeenCalledTimes(2);
  });

  it('forwards lines only to the sink of the current run', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const entries: LogEntry[] = [];
    logger.addLogSink('run-a', (entry) => entries.push(entry));

    logger.info('outside any run');
    logger.withRunContext('run-a', () => logger.application('Cloud Engineer', 'verified'));
    logger.withRunContext('run-b', () => logger.info('other run'));

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('apply');
    expect(entries[0]?.message.endsWith('APPLY VERIFIED Cloud Engineer')).toBe(true);
  });
});
