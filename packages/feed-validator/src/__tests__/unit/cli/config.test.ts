/**
 * Custom Rules Loading Unit Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CUSTOM_RULES_ENV,
  loadRules,
  parseCustomRules,
  resolveRulesPath,
} from '../../../cli/lib/config.js';
import { DEFAULT_RULES } from '../../../config/rules.js';
import { RulesConfigError } from '../../../core/errors.js';

function rulesFailure(action: () => unknown): RulesConfigError {
  try {
    action();
  } catch (error) {
    if (error instanceof RulesConfigError) return error;
    throw error;
  }
  throw new Error('expected a RulesConfigError');
}

describe('resolveRulesPath', () => {
  it('prefers the option over the environment', () => {
    expect(resolveRulesPath('cli.yml', { [CUSTOM_RULES_ENV]: 'env.yml' })).toBe('cli.yml');
  });

  it('falls back to the environment variable', () => {
    expect(resolveRulesPath(undefined, { [CUSTOM_RULES_ENV]: 'env.yml' })).toBe('env.yml');
  });

  it('ignores an empty environment variable', () => {
    expect(resolveRulesPath(undefined, { [CUSTOM_RULES_ENV]: '' })).toBeUndefined();
    expect(resolveRulesPath(undefined, {})).toBeUndefined();
  });
});

describe('parseCustomRules', () => {
  it('reads YAML keys', () => {
    expect(parseCustomRules('max_bus_speed: 150\nclose_stops_distance: 20\n', 'rules.yml')).toEqual({
      max_bus_speed: 150,
      close_stops_distance: 20,
    });
  });

  it('reads JSON', () => {
    expect(parseCustomRules('{"max_rail_speed": 250}', 'rules.json')).toEqual({ max_rail_speed: 250 });
  });

  it('treats an empty file as no rules', () => {
    expect(parseCustomRules('', 'rules.yml')).toEqual({});
  });

  it('lists every schema violation', () => {
    const error = rulesFailure(() => parseCustomRules('max_bus_speed: -5\nslow_speed: fast\n', 'rules.yml'));

    expect(error.message).toBe('Invalid rules file rules.yml');
    expect(error.path).toBe('rules.yml');
    expect(error.issues).toEqual([
      'max_bus_speed: Number must be greater than 0',
      'slow_speed: Expected number, received string',
    ]);
    expect(error.getSummary()).toBe(
      'Invalid rules file rules.yml\n  - max_bus_speed: Number must be greater than 0\n  - slow_speed: Expected number, received string'
    );
  });

  it('reports unknown keys without a path', () => {
    const error = rulesFailure(() => parseCustomRules('max_boat_speed: 40\n', 'rules.yml'));

    expect(error.issues).toEqual(["Unrecognized key(s) in object: 'max_boat_speed'"]);
  });

  it('reports YAML syntax errors', () => {
    const error = rulesFailure(() => parseCustomRules('max_bus_speed: [150\n', 'rules.yml'));

    expect(error.message.startsWith('Invalid YAML in rules file rules.yml: ')).toBe(true);
    expect(error.issues).toEqual([]);
  });
});

describe('loadRules', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'feed-rules-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('returns the defaults without a path', () => {
    expect(loadRules(undefined)).toBe(DEFAULT_RULES);
  });

  it('merges a rules file over the defaults', async () => {
    const path = join(workDir, 'rules.yml');
    await writeFile(path, 'max_bus_speed: 150\n');

    const rules = loadRules(path);

    expect(rules.maxSpeeds.bus).toBe(150);
    expect(rules.maxSpeeds.rail).toBe(DEFAULT_RULES.maxSpeeds.rail);
  });

  it('reports an unreadable file', () => {
    const path = join(workDir, 'absent.yml');
    const error = rulesFailure(() => loadRules(path));

    expect(error.message.startsWith(`Unable to read rules file ${path}: `)).toBe(true);
  });
});
