import { describe, it, expect } from 'vitest';
import { Config } from '../src/config.js';
import { Logger } from '../src/logger.js';

function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

describe('Logger', () => {
  it('logs JSON by default', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('staged', { dependency: 'foo' });
    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('staged');
    expect(parsed.logger).toBe('headdeps');
    expect(parsed.extra).toEqual({ dependency: 'foo' });
  });

  it('logs text format', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ format: 'text', name: 'render', output });
    logger.warn('careful', { a: 1 });
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[WARN\] \[render\] careful a=1\n$/);
  });

  it('filters below the configured level', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ level: 'warn', output });
    logger.trace('no');
    logger.debug('no');
    logger.info('no');
    logger.warn('yes');
    logger.error('yes');
    logger.fatal('yes');
    expect(lines).toHaveLength(3);
  });

  it('drops debug lines at the default level', () => {
    const { output, lines } = createBufferOutput();
    new Logger({ output }).debug('hidden');
    expect(lines).toHaveLength(0);
  });

  it('builds from config', () => {
    const { output, lines } = createBufferOutput();
    const logger = Logger.fromConfig(new Config({ logging: { level: 'debug', format: 'text' } }), { output });
    expect(logger.isEnabled('debug')).toBe(true);
    logger.debug('shown');
    expect(lines[0]).toContain('[DEBUG] [headdeps] shown');
  });

  it('ignores unknown config values', () => {
    const logger = Logger.fromConfig(new Config({ logging: { level: 'loud' } }));
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('debug')).toBe(false);
  });

  it('child loggers share level and output', () => {
    const { output, lines } = createBufferOutput();
    const child = new Logger({ level: 'error', output }).child('staging');
    child.warn('no');
    child.error('yes');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).logger).toBe('staging');
  });
});
