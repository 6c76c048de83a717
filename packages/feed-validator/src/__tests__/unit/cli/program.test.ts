/**
 * Command Line Program Unit Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CUSTOM_RULES_ENV } from '../../../cli/lib/config.js';
import { EXIT_CODES, runCli, type CliIO } from '../../../cli/program.js';
import { VALIDATOR_VERSION } from '../../../core/metadata.js';
import { parseReport } from '../../../core/report-format.js';

const MINIMAL_FEED = fileURLToPath(new URL('../../fixtures/minimal-feed', import.meta.url));

function captureIO(env: NodeJS.ProcessEnv = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
    env,
  };
  return { io, stdout: () => out.join(''), stderr: () => err.join('') };
}

describe('runCli', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'feed-cli-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('prints a JSON report for a feed directory', async () => {
    const { io, stdout } = captureIO();

    const code = await runCli(['-i', MINIMAL_FEED], io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout().endsWith('}\n')).toBe(true);
    const report = parseReport(stdout());
    expect(report.metadata).toMatchObject({
      linesCount: 1,
      tripsCount: 1,
      networks: ['City Transit'],
      validatorVersion: VALIDATOR_VERSION,
    });
  });

  it('prints YAML on request', async () => {
    const { io, stdout } = captureIO();

    const code = await runCli(['--input', MINIMAL_FEED, '--format', 'yaml'], io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout().startsWith('metadata:\n')).toBe(true);
    expect(parseReport(stdout()).metadata?.tripsCount).toBe(1);
  });

  it('reports an unreadable input as an InvalidArchive report', async () => {
    const { io, stdout } = captureIO();
    const input = join(workDir, 'absent.zip');

    const code = await runCli(['-i', input], io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const report = parseReport(stdout());
    expect(report.metadata).toBeNull();
    expect(Object.keys(report.validations)).toEqual(['InvalidArchive']);
    expect(report.validations.InvalidArchive[0]).toMatchObject({
      severity: 'Fatal',
      objectId: input,
      objectType: 'file',
    });
  });

  it('applies a rules file from the environment', async () => {
    const path = join(workDir, 'rules.yml');
    await writeFile(path, 'max_bus_speed: -5\n');
    const { io, stdout, stderr } = captureIO({ [CUSTOM_RULES_ENV]: path });

    const code = await runCli(['-i', MINIMAL_FEED], io);

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(stdout()).toBe('');
    expect(stderr()).toContain('  - max_bus_speed: Number must be greater than 0');
  });

  it('rejects an unreadable rules file', async () => {
    const { io, stderr } = captureIO();
    const path = join(workDir, 'absent.yml');

    const code = await runCli(['-i', MINIMAL_FEED, '-c', path], io);

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(stderr()).toContain(`Unable to read rules file ${path}`);
  });

  it('logs JSON lines to stderr only', async () => {
    const { io, stdout, stderr } = captureIO();

    await runCli(['-i', MINIMAL_FEED, '--log-json'], io);

    const [first] = stderr().trimEnd().split('\n');
    expect(JSON.parse(first)).toMatchObject({
      level: 'info',
      message: 'Starting validate',
      command: 'validate',
      input: MINIMAL_FEED,
      format: 'json',
      maxIssues: 1000,
    });
    expect(parseReport(stdout()).metadata).not.toBeNull();
  });

  it.each([
    [['-f', 'xml', '-i', 'feed.zip']],
    [['-m', 'many', '-i', 'feed.zip']],
    [['-m', '-3', '-i', 'feed.zip']],
    [[]],
    [['-i', 'feed.zip', '--unknown']],
  ])('treats %j as a usage error', async argv => {
    const { io, stdout, stderr } = captureIO();

    expect(await runCli(argv, io)).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(stdout()).toBe('');
    expect(stderr()).toMatch(/^error: /);
  });

  it('prints the version', async () => {
    const { io, stdout } = captureIO();

    expect(await runCli(['--version'], io)).toBe(EXIT_CODES.SUCCESS);
    expect(stdout()).toBe(`${VALIDATOR_VERSION}\n`);
  });

  it('prints help', async () => {
    const { io, stdout } = captureIO();

    expect(await runCli(['--help'], io)).toBe(EXIT_CODES.SUCCESS);
    expect(stdout()).toContain('Usage: feed-validator [options]');
    expect(stdout()).toContain('-i, --input <path>');
  });
});
