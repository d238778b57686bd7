/**
 * Tests for the structured logger
 */

import { describe, it, expect } from 'vitest';
import { createLogger, timeOperation } from '../../src/lib/logger';
import type { LogLevel } from '../../src/types';

function capture() {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return { lines, sink: (level: LogLevel, line: string) => lines.push({ level, line }) };
}

describe('Logger', () => {
  it('should drop entries below the threshold', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'warn', sink });

    log.info('ignored');
    log.warn('kept');

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('warn');
  });

  it('should write JSON lines with merged child context', () => {
    const { lines, sink } = capture();
    const log = createLogger({ format: 'json', sink }).child({ runId: 'run-1' });

    log.child({ url: 'https://a.example/list.txt' }).info('Source fetched', { bytes: 12 });

    expect(JSON.parse(lines[0].line)).toMatchObject({
      level: 'info',
      message: 'Source fetched',
      context: { runId: 'run-1', url: 'https://a.example/list.txt', bytes: 12 },
    });
  });

  it('should write readable text lines', () => {
    const { lines, sink } = capture();
    const log = createLogger({ format: 'text', sink });

    log.info('hello', { a: 1 });

    expect(lines[0].line).toMatch(/^\d{2}:\d{2}:\d{2} INFO {2}hello \{"a":1\}$/);
  });

  it('should time an operation and return its value', async () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'debug', format: 'json', sink });

    const value = await timeOperation('Probe stage', async () => 42, log);

    expect(value).toBe(42);
    const entry = JSON.parse(lines[0].line);
    expect(entry.message).toBe('Probe stage completed');
    expect(typeof entry.context.durationMs).toBe('number');
  });
});
