/**
 * Custom Rules Loading
 *
 * Reads a YAML rules file (JSON is valid YAML) and merges it over the
 * built-in rules. Path precedence:
 * 1. --custom-rules option
 * 2. FEED_VALIDATOR_CUSTOM_RULES environment variable
 * 3. None: built-in defaults
 *
 * @module cli/lib/config
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  customRulesSchema,
  DEFAULT_RULES,
  mergeRules,
  type CustomRules,
  type RuleConfiguration,
} from '../../config/rules.js';
import { RulesConfigError } from '../../core/errors.js';

export const CUSTOM_RULES_ENV = 'FEED_VALIDATOR_CUSTOM_RULES';

export function resolveRulesPath(
  optionPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const envPath = env[CUSTOM_RULES_ENV];
  return optionPath ?? (envPath !== undefined && envPath.length > 0 ? envPath : undefined);
}

/**
 * Validate the text of a rules file; `path` only labels errors
 */
export function parseCustomRules(text: string, path: string): CustomRules {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RulesConfigError(`Invalid YAML in rules file ${path}: ${message}`, path);
  }

  // An empty file sets nothing
  const result = customRulesSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new RulesConfigError(
      `Invalid rules file ${path}`,
      path,
      result.error.errors.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

export function loadCustomRules(path: string): CustomRules {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RulesConfigError(`Unable to read rules file ${path}: ${message}`, path);
  }
  return parseCustomRules(text, path);
}

/**
 * Rules for a run: defaults, or a rules file merged over them
 */
export function loadRules(path: string | undefined): RuleConfiguration {
  return path === undefined ? DEFAULT_RULES : mergeRules(loadCustomRules(path));
}
