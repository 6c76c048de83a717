/**
 * Validation Engine
 *
 * Orchestrates one validation run:
 *
 * 1. Index the raw feed (never throws; broken tables become one Fatal issue)
 * 2. Run every registered check, in order, skipping checks whose required
 *    tables are unavailable
 * 3. Attach geometry to each issue and hand it to the collector
 * 4. Summarize metadata from the index and the true issue counts
 *
 * A check that throws is isolated: its failure becomes one issue of the
 * check's domain kind and the run continues with the next check.
 */

import { DEFAULT_RULES, type RuleConfiguration } from '../config/rules.js';
import { loadFeed } from '../loader/feed-loader.js';
import { CHECKS } from '../validators/index.js';
import { FeedLoadError } from './errors.js';
import { DEFAULT_MAX_ISSUES, IssueCollector } from './issue-collector.js';
import { summarizeMetadata, type Metadata } from './metadata.js';
import { ModelIndex } from './model-index.js';
import type { RawFeed } from './types/feed.js';
import { createIssue, type Issue } from './types/issues.js';
import type { Check } from './types/validators.js';
import { createLogger, type Logger } from './utils/logger.js';
import { addIssueGeometry } from './visualization.js';

// ============================================================================
// Types
// ============================================================================

export interface Report {
  /** Null when the input could not be read at all */
  readonly metadata: Metadata | null;
  /** Retained issues per kind, kinds in taxonomy order */
  readonly validations: Readonly<Record<string, readonly Issue[]>>;
}

export interface ValidationOptions {
  /** Retained issues per kind (default 1000) */
  readonly maxIssues?: number;
  readonly rules?: RuleConfiguration;
  /** Checks to run, in order (default: every registered check) */
  readonly checks?: readonly Check[];
  readonly logger?: Logger;
}

const defaultLogger = createLogger('engine');

// ============================================================================
// Engine
// ============================================================================

function runCheck(
  check: Check,
  index: ModelIndex,
  rules: RuleConfiguration,
  collector: IssueCollector,
  logger: Logger
): void {
  let produced = 0;
  try {
    for (const issue of check.run(index, rules)) {
      collector.add(addIssueGeometry(issue, index));
      produced++;
    }
    logger.debug('Check completed', { check: check.name, issues: produced });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('Check failed', { check: check.name, error: message, issuesBeforeFailure: produced });
    collector.add(
      createIssue(check.domain, check.name, {
        details: `The check ${check.name} failed: ${message}`,
      })
    );
  }
}

/**
 * Validate an already loaded feed
 */
export function validateFeed(raw: RawFeed, options: ValidationOptions = {}): Report {
  const logger = options.logger ?? defaultLogger;
  const rules = options.rules ?? DEFAULT_RULES;
  const checks = options.checks ?? CHECKS;
  const collector = new IssueCollector(options.maxIssues ?? DEFAULT_MAX_ISSUES);
  const startTime = Date.now();

  logger.debug('Validation started', { files: raw.files.length, checks: checks.length });

  const index = ModelIndex.build(raw);
  collector.addAll(index.buildIssues);
  if (index.buildIssues.length > 0) {
    logger.warn('Model partially loaded', {
      unavailable: index.unavailable.map(entry => entry.table),
    });
  }

  for (const check of checks) {
    if (!index.isAvailable(...check.requires)) {
      logger.debug('Check skipped', {
        check: check.name,
        missing: check.requires.filter(table => !index.isAvailable(table)),
      });
      continue;
    }
    runCheck(check, index, rules, collector, logger);
  }

  const metadata = summarizeMetadata(index, collector.issueCounts());

  logger.info('Validation completed', {
    issues: collector.total,
    duration_ms: Date.now() - startTime,
  });

  return { metadata, validations: collector.validations() };
}

/**
 * Report for an input that could not be read as a feed
 */
export function invalidArchiveReport(input: string, message: string): Report {
  return {
    metadata: null,
    validations: {
      InvalidArchive: [
        createIssue('InvalidArchive', input, {
          objectType: 'file',
          details: message,
        }),
      ],
    },
  };
}

/**
 * Load a feed from a directory or .zip archive and validate it
 *
 * An unreadable input yields an InvalidArchive report; other errors
 * propagate.
 */
export async function validateInput(input: string, options: ValidationOptions = {}): Promise<Report> {
  const logger = options.logger ?? defaultLogger;

  let raw: RawFeed;
  try {
    raw = await loadFeed(input, { logger });
  } catch (error) {
    if (error instanceof FeedLoadError) {
      logger.error('Unable to read feed', { input, error: error.message });
      return invalidArchiveReport(input, error.message);
    }
    throw error;
  }

  return validateFeed(raw, options);
}
