import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger, type LogLevel } from '../../src/utils/logger.js';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

const LINE = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[(DEBUG|INFO|WARN|ERROR)\] (.*)$/;

describe('logger', () => {
  let lines: Record<ConsoleMethod, string[]>;

  beforeEach(() => {
    lines = { debug: [], info: [], warn: [], error: [] };
    for (const method of ['debug', 'info', 'warn', 'error'] as const) {
      vi.spyOn(console, method).mockImplementation((text?: unknown, ..._rest: unknown[]) => {
        lines[method].push(String(text));
      });
    }
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel(undefined);
    delete process.env.LOG_LEVEL;
  });

  function emitAll(): void {
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
  }

  describe('threshold', () => {
    it.each<[LogLevel, number]>([
      ['debug', 4],
      ['info', 3],
      ['warn', 2],
      ['error', 1],
    ])('should emit %s and above', (level, expected) => {
      logger.setLevel(level);
      emitAll();

      const total = lines.debug.length + lines.info.length + lines.warn.length + lines.error.length;
      expect(total).toBe(expected);
    });

    it('should read LOG_LEVEL while no level is pinned', () => {
      process.env.LOG_LEVEL = 'error';
      expect(logger.getLevel()).toBe('error');

      process.env.LOG_LEVEL = 'loud';
      expect(logger.getLevel()).toBe('info');
    });

    it('should prefer a pinned level over LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'debug';
      logger.setLevel('warn');
      logger.info('skipped');

      expect(lines.info).toEqual([]);
    });
  });

  describe('line layout', () => {
    it('should write timestamp, level and message without context', () => {
      logger.warn('crew roster incomplete');

      const match = LINE.exec(lines.warn[0] ?? '');
      expect(match?.[1]).toBe('WARN');
      expect(match?.[2]).toBe('crew roster incomplete');
    });

    it('should append context as JSON', () => {
      logger.info('checked', { violations: 2 });

      expect(LINE.exec(lines.info[0] ?? '')?.[2]).toBe('checked {"violations":2}');
    });

    it('should merge error details into the context', () => {
      logger.error('failed', new RangeError('bad bound'), { field: 'age' });

      const context: unknown = JSON.parse((LINE.exec(lines.error[0] ?? '')?.[2] ?? '').replace(/^failed /, ''));
      expect(context).toMatchObject({ field: 'age', errorName: 'RangeError', errorMessage: 'bad bound' });
    });

    it('should stringify thrown values that are not errors', () => {
      logger.warn('odd', 42);

      expect(lines.warn[0]).toContain('{"errorValue":"42"}');
    });
  });

  describe('run context', () => {
    it('should stamp lines with run, schema and source, in that order', async () => {
      await logger.withRunContext({ runId: 'run-test', source: 'contact.yaml' }, async () => {
        logger.updateContext({ schemaName: 'alien_contact' });
        logger.info('inside');
      });
      logger.info('outside');

      expect(lines.info[0]).toContain('inside {"runId":"run-test","schema":"alien_contact","source":"contact.yaml"}');
      expect(LINE.exec(lines.info[1] ?? '')?.[2]).toBe('outside');
    });

    it('should generate run IDs and expose them only inside the run', async () => {
      const seen = await logger.withRunContext({}, async () => logger.getRunId());

      expect(seen).toMatch(/^run-[A-Za-z0-9_-]{8}$/);
      expect(logger.getRunId()).toBeUndefined();
    });

    it('should measure elapsed time only inside the run', async () => {
      const elapsed = await logger.withRunContext({}, async () => logger.getElapsedMs());

      expect(elapsed).toBeGreaterThanOrEqual(0);
      expect(logger.getElapsedMs()).toBeUndefined();
    });

    it('should ignore context updates outside a run', () => {
      logger.updateContext({ schemaName: 'space_station' });
      logger.info('plain');

      expect(LINE.exec(lines.info[0] ?? '')?.[2]).toBe('plain');
    });
  });
});
