/**
 * CLI Logger Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createCLILogger } from '../../../cli/lib/logger.js';

function capture() {
  const lines: string[] = [];
  return {
    lines,
    output: {
      write(chunk: string) {
        lines.push(chunk);
        return true;
      },
    },
  };
}

describe('CLILogger', () => {
  it('writes human-readable lines without color', () => {
    const { lines, output } = capture();
    const logger = createCLILogger({ output, color: false });

    logger.info('Feed loaded', { files: 6, failedTables: [] });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ INFO  Feed loaded \(files=6 failedTables=\[\]\)\n$/);
  });

  it('drops lines below its level', () => {
    const { lines, output } = capture();
    const logger = createCLILogger({ output, color: false, level: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ WARN  kept\n$/);
  });

  it('writes JSON lines carrying the command context', () => {
    const { lines, output } = capture();
    const logger = createCLILogger({ output, json: true });

    logger.commandStart('validate', { input: 'feed.zip' });
    logger.commandEnd(false);

    const entries: unknown[] = lines.map(line => JSON.parse(line));
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'Starting validate',
      service: 'feed-validator',
      command: 'validate',
      input: 'feed.zip',
    });
    expect(entries[1]).toMatchObject({
      level: 'error',
      message: 'Command failed',
      command: 'validate',
      duration_ms: expect.any(Number),
    });
  });

  it('colors level labels when asked', () => {
    const { lines, output } = capture();
    const logger = createCLILogger({ output, color: true });

    logger.error('boom');

    expect(lines[0]).toContain('\x1b[31mERROR\x1b[0m boom');
  });
});
