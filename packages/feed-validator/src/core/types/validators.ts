/**
 * Check Types
 *
 * A check is a stateless function of the model index and the rule
 * configuration. The engine owns the ordered list of checks and decides
 * which ones can run against a partially loaded model.
 */

import type { RuleConfiguration } from '../../config/rules.js';
import type { ModelIndex } from '../model-index.js';
import type { TableName } from './feed.js';
import type { Issue, IssueKind } from './issues.js';

export interface Check {
  /** Stable name, used in logs and failure details */
  readonly name: string;

  /**
   * Tables the check cannot do without. When one of them is unavailable
   * the check is skipped instead of reporting false positives.
   */
  readonly requires: readonly TableName[];

  /** Kind used to report an internal failure of the check */
  readonly domain: IssueKind;

  run(index: ModelIndex, rules: RuleConfiguration): Iterable<Issue>;
}
