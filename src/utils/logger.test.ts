import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, createSilentLogger } from './logger.js';

const FIXED = new Date('2024-01-15T10:30:00.000Z');

function capture(debugMode = false): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    component: 'TestLogger',
    debugMode,
    now: () => FIXED,
    write: (line) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

function parseLine(lines: readonly string[], index: number): unknown {
  const line = lines[index];
  if (line === undefined) {
    throw new Error(`Expected output at index ${String(index)} but got undefined`);
  }
  return JSON.parse(line.trim());
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('serialization fallback', () => {
    it('should handle circular references without throwing', () => {
      const { logger, lines } = capture();
      const circular: Record<string, unknown> = { name: 'test' };
      circular.self = circular;

      expect(() => {
        logger.info('circular_test', circular);
      }).not.toThrow();

      expect(lines).toHaveLength(1);
      expect(parseLine(lines, 0)).toMatchObject({
        timestamp: '2024-01-15T10:30:00.000Z',
        level: 'info',
        component: 'TestLogger',
        event: 'circular_test',
        originalData: '[unserializable]',
      });
    });

    it('should handle BigInt values without throwing', () => {
      const { logger, lines } = capture();

      logger.warn('bigint_test', { value: BigInt(9007199254740991) });

      const parsed = parseLine(lines, 0);
      expect(parsed).toMatchObject({ level: 'warn', originalData: '[unserializable]' });
      expect(parsed).toHaveProperty('serializationError');
    });

    it('should write a single JSON line even when serialization fails', () => {
      const { logger, lines } = capture();
      const circular: Record<string, unknown> = {};
      circular.ref = circular;

      logger.error('error_with_circular', circular);

      const line = lines[0] ?? '';
      expect(line.endsWith('\n')).toBe(true);
      expect(line.trim().split('\n')).toHaveLength(1);
    });

    it('should handle arbitrary data (property-based)', () => {
      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          const { logger, lines } = capture();

          logger.info('fuzz_test', data);

          expect(lines).toHaveLength(1);
          expect(parseLine(lines, 0)).toMatchObject({
            level: 'info',
            component: 'TestLogger',
            event: 'fuzz_test',
          });
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages with data', () => {
      const { logger, lines } = capture();

      logger.info('definitions_loaded', { count: 2 });

      expect(parseLine(lines, 0)).toEqual({
        timestamp: '2024-01-15T10:30:00.000Z',
        level: 'info',
        component: 'TestLogger',
        event: 'definitions_loaded',
        data: { count: 2 },
      });
    });

    it('should omit data when none is given', () => {
      const { logger, lines } = capture();

      logger.info('server_started');

      expect(parseLine(lines, 0)).not.toHaveProperty('data');
    });

    it('should not log debug messages when debugMode is false', () => {
      const { logger, lines } = capture(false);

      logger.debug('debug_event', { key: 'value' });

      expect(lines).toHaveLength(0);
    });

    it('should log debug messages when debugMode is true', () => {
      const { logger, lines } = capture(true);

      logger.debug('debug_event');

      expect(parseLine(lines, 0)).toMatchObject({ level: 'debug', event: 'debug_event' });
    });

    it('should log warn and error levels', () => {
      const { logger, lines } = capture();

      logger.warn('token_rejected', { reason: 'expired' });
      logger.error('tool_failed', { code: 500 });

      expect(parseLine(lines, 0)).toMatchObject({ level: 'warn', data: { reason: 'expired' } });
      expect(parseLine(lines, 1)).toMatchObject({ level: 'error', data: { code: 500 } });
    });
  });

  describe('child', () => {
    it('should share the sink, clock and debug mode under a new component', () => {
      const { logger, lines } = capture(true);

      logger.child('DefinitionCatalog').debug('reload_started');

      expect(parseLine(lines, 0)).toMatchObject({
        timestamp: '2024-01-15T10:30:00.000Z',
        level: 'debug',
        component: 'DefinitionCatalog',
      });
    });
  });

  describe('default sink', () => {
    it('should write to stderr', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const logger = new Logger({ component: 'StderrTest', now: () => FIXED });

      logger.info('stderr_event');

      expect(write).toHaveBeenCalledWith(
        '{"timestamp":"2024-01-15T10:30:00.000Z","level":"info","component":"StderrTest","event":"stderr_event"}\n'
      );
    });

    it('should discard everything with a silent logger', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      createSilentLogger().error('ignored');

      expect(write).not.toHaveBeenCalled();
    });
  });
});
