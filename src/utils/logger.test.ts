import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

const FIXED_NOW = (): Date => new Date('2025-03-01T08:00:00.000Z');

function captureLogger(debugMode = false): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    component: 'TestComponent',
    debugMode,
    now: FIXED_NOW,
    sink: (line) => lines.push(line),
  });
  return { logger, lines };
}

function parseLine(lines: string[], index: number): unknown {
  const line = lines[index];
  if (line === undefined) {
    throw new Error(`Expected output at index ${String(index)} but got undefined`);
  }
  return JSON.parse(line.trim());
}

describe('Logger', () => {
  it('should write one JSON line per entry with the standard fields', () => {
    const { logger, lines } = captureLogger();
    logger.info('rules_loaded', { sections: 9 });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('\n')).toBe(true);
    expect(parseLine(lines, 0)).toEqual({
      timestamp: '2025-03-01T08:00:00.000Z',
      level: 'info',
      component: 'TestComponent',
      event: 'rules_loaded',
      data: { sections: 9 },
    });
  });

  it('should omit data when none is given', () => {
    const { logger, lines } = captureLogger();
    logger.warn('empty_document');

    expect(parseLine(lines, 0)).toEqual({
      timestamp: '2025-03-01T08:00:00.000Z',
      level: 'warn',
      component: 'TestComponent',
      event: 'empty_document',
    });
  });

  it('should suppress debug entries unless debugMode is enabled', () => {
    const quiet = captureLogger(false);
    quiet.logger.debug('section_validated');
    expect(quiet.lines).toHaveLength(0);

    const verbose = captureLogger(true);
    verbose.logger.debug('section_validated', { section: 'objectives' });
    expect(parseLine(verbose.lines, 0)).toMatchObject({ level: 'debug' });
  });

  it('should emit error entries', () => {
    const { logger, lines } = captureLogger();
    logger.error('catalog_invalid', { field: 'sections.objectives.min_length' });
    expect(parseLine(lines, 0)).toMatchObject({ level: 'error' });
  });

  it('should handle circular references without throwing', () => {
    const { logger, lines } = captureLogger();
    const circular: Record<string, unknown> = { name: 'loop' };
    circular.self = circular;

    expect(() => {
      logger.info('circular_test', circular);
    }).not.toThrow();

    expect(parseLine(lines, 0)).toMatchObject({
      event: 'circular_test',
      originalData: '[unserializable]',
      serializationError: expect.any(String),
    });
  });

  it('should always produce parseable JSON for arbitrary event names', () => {
    fc.assert(
      fc.property(fc.string(), (event) => {
        const { logger, lines } = captureLogger();
        logger.info(event);
        const parsed = parseLine(lines, 0);
        return typeof parsed === 'object' && parsed !== null && 'event' in parsed && parsed.event === event;
      })
    );
  });
});

describe('Logger default sink', () => {
  let writes: string[];

  beforeEach(() => {
    writes = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array): boolean => {
      writes.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write to stderr by default', () => {
    new Logger({ component: 'pqa' }).info('started');
    expect(writes).toHaveLength(1);
    expect(writes[0]).toContain('"event":"started"');
  });
});
