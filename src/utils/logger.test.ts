import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import * as fc from 'fast-check';
import { Logger, createMemoryLogger } from './logger.js';

describe('Logger', () => {
  let captured: string[] = [];

  function createLogger(debugMode = false): Logger {
    return new Logger({
      component: 'TestLogger',
      debugMode,
      sink: (line) => {
        captured.push(line);
      },
    });
  }

  function parseOutput(index: number): Record<string, unknown> {
    const output = captured[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  beforeEach(() => {
    captured = [];
  });

  describe('levels', () => {
    it('should write info, warn and error entries', () => {
      const logger = createLogger();

      logger.info('started');
      logger.warn('variable_overwritten', { key: 'zookeeper_id' });
      logger.error('configuration_error');

      expect(captured).toHaveLength(3);
      expect(parseOutput(0).level).toBe('info');
      expect(parseOutput(1).level).toBe('warn');
      expect(parseOutput(1).data).toEqual({ key: 'zookeeper_id' });
      expect(parseOutput(2).level).toBe('error');
    });

    it('should drop debug entries unless debug mode is on', () => {
      createLogger(false).debug('hidden');
      expect(captured).toHaveLength(0);

      createLogger(true).debug('shown', { n: 1 });
      expect(captured).toHaveLength(1);
      expect(parseOutput(0).event).toBe('shown');
    });

    it('should omit data when none is given', () => {
      createLogger().info('bare');
      expect('data' in parseOutput(0)).toBe(false);
    });
  });

  describe('entry format', () => {
    it('should write one JSON line with timestamp, level, component and event', () => {
      createLogger().warn('fields');

      const line = captured[0] ?? '';
      expect(line.endsWith('\n')).toBe(true);
      expect(line.trim().split('\n')).toHaveLength(1);

      const parsed = parseOutput(0);
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(parsed.component).toBe('TestLogger');
      expect(parsed.event).toBe('fields');
    });
  });

  describe('safe JSON.stringify', () => {
    it('should handle circular references without throwing', () => {
      const logger = createLogger();
      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('circular_test');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should handle BigInt values without throwing', () => {
      createLogger().info('bigint_test', { value: BigInt(9007199254740991) });

      const parsed = parseOutput(0);
      expect(parsed.serializationError).toBeDefined();
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should handle arbitrary values without throwing (property-based)', () => {
      const logger = createLogger();

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything()), (data) => {
          captured = [];
          logger.info('fuzz_test', data);
          expect(captured).toHaveLength(1);
        })
      );
    });
  });

  describe('child', () => {
    it('should share the sink and debug setting under a new component', () => {
      const parent = createLogger(true);
      const child = parent.child('assignment');

      child.debug('placed');

      expect(child.isDebugEnabled).toBe(true);
      expect(parseOutput(0).component).toBe('assignment');
    });
  });

  describe('default sink', () => {
    let writeSpy: MockInstance<typeof process.stderr.write>;

    beforeEach(() => {
      writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      writeSpy.mockRestore();
    });

    it('should write to stderr when no sink is given', () => {
      new Logger({ component: 'StderrTest' }).info('to_stderr');

      expect(writeSpy).toHaveBeenCalledTimes(1);
      const firstCall = writeSpy.mock.calls[0];
      expect(String(firstCall?.[0])).toContain('"event":"to_stderr"');
    });
  });
});

describe('createMemoryLogger', () => {
  it('should collect parsed entries', () => {
    const { logger, entries } = createMemoryLogger('memory');

    logger.warn('variable_file_overwritten', { node: 'foo0' });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.event).toBe('variable_file_overwritten');
    expect(entries[0]?.data).toEqual({ node: 'foo0' });
  });
});
