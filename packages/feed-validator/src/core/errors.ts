/**
 * Feed Validator Error Types
 *
 * Errors thrown outside the validation run itself: reading the archive,
 * decoding a table, loading a rules file. Problems found in the feed are
 * never thrown; they are issues in the report.
 */

import type { TableLoadError } from './types/feed.js';

/**
 * The input could not be opened as a feed at all
 *
 * RECOVERY:
 * - Check the path exists and is a directory or a .zip archive
 * - Re-download the archive if it is truncated
 */
export class FeedLoadError extends Error {
  constructor(
    message: string,
    public readonly input: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedLoadError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FeedLoadError);
    }
  }
}

/**
 * A row of a table could not be decoded
 */
export class TableParseError extends Error {
  constructor(
    message: string,
    public readonly fileName: string,
    public readonly lineNumber?: number,
    public readonly headers: readonly string[] = [],
    public readonly values: readonly string[] = []
  ) {
    super(message);
    this.name = 'TableParseError';
  }

  /**
   * Shape stored on a failed RawTable
   */
  toLoadError(): TableLoadError {
    return {
      fileName: this.fileName,
      message: this.message,
      ...(this.lineNumber !== undefined && {
        lineNumber: this.lineNumber,
        headers: this.headers,
        values: this.values,
      }),
    };
  }
}

/**
 * A custom rules file is unreadable or does not match the rules schema
 */
export class RulesConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'RulesConfigError';
  }

  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map(issue => `  - ${issue}`)].join('\n');
  }
}

/**
 * Text handed to parseReport is not a validation report
 */
export class ReportParseError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ReportParseError';
  }
}
