import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  formatEntry,
  getLogLevel,
  setJsonMode,
  setLogLevel,
  type LogLevel,
} from '../../src/utils/logger.js';

describe('logger', () => {
  let savedLevel: LogLevel;

  beforeEach(() => {
    savedLevel = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(savedLevel);
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  describe('formatEntry', () => {
    it('formats time, level and message', () => {
      expect(
        formatEntry({ timestamp: '2024-03-01T12:34:56.789Z', level: 'warn', message: 'Skipping set 2' }),
      ).toBe('[12:34:56] WARN  Skipping set 2');
    });

    it('appends metadata as key=value pairs', () => {
      expect(
        formatEntry({
          timestamp: '2024-03-01T08:00:00.000Z',
          level: 'info',
          message: 'Diagnostics complete',
          meta: { sets: 2, ids: [1, 2] },
        }),
      ).toBe('[08:00:00] INFO  Diagnostics complete (sets=2 ids=[1,2])');
    });

    it('emits JSON in JSON mode', () => {
      setJsonMode(true);
      const entry = { timestamp: '2024-03-01T08:00:00.000Z', level: 'error' as const, message: 'x' };
      expect(formatEntry(entry)).toBe(JSON.stringify(entry));
    });
  });

  describe('createLogger', () => {
    it('prefixes messages and writes to stderr', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('debug');

      createLogger('report').info('Report written');

      expect(write).toHaveBeenCalledTimes(1);
      expect(String(write.mock.calls[0][0])).toMatch(/^\[\d\d:\d\d:\d\d\] INFO {2}\[report\] Report written\n$/);
    });

    it('drops messages below the current level', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('warn');

      const log = createLogger('diagnostics');
      log.debug('hidden');
      log.info('hidden');
      log.warn('shown');

      expect(write).toHaveBeenCalledTimes(1);
    });

    it('writes nothing when silent', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setLogLevel('silent');

      createLogger('x').error('hidden');

      expect(write).not.toHaveBeenCalled();
    });
  });
});
