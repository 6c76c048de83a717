/**
 * Issue Collector
 *
 * Accumulates issues per kind. Two pieces of state are kept per kind:
 *
 * - the retained list, bounded by `maxIssues`, which goes into the report;
 * - the true count, unbounded, which goes into the metadata.
 *
 * The count is never derived from the list length, so lowering the cap
 * changes what is displayed and nothing else.
 */

import { ISSUE_KINDS, type Issue, type IssueKind } from './types/issues.js';

export const DEFAULT_MAX_ISSUES = 1000;

export class IssueCollector {
  private readonly retained = new Map<IssueKind, Issue[]>();
  private readonly counts = new Map<IssueKind, number>();

  constructor(private readonly maxIssues: number = DEFAULT_MAX_ISSUES) {
    if (!Number.isInteger(maxIssues) || maxIssues < 0) {
      throw new RangeError(`maxIssues must be a non-negative integer, got ${maxIssues}`);
    }
  }

  add(issue: Issue): void {
    this.counts.set(issue.kind, (this.counts.get(issue.kind) ?? 0) + 1);

    const list = this.retained.get(issue.kind) ?? [];
    if (list.length < this.maxIssues) {
      list.push(issue);
      this.retained.set(issue.kind, list);
    }
  }

  addAll(issues: Iterable<Issue>): void {
    for (const issue of issues) {
      this.add(issue);
    }
  }

  /**
   * True number of issues of a kind, regardless of the cap
   */
  count(kind: IssueKind): number {
    return this.counts.get(kind) ?? 0;
  }

  get total(): number {
    let total = 0;
    for (const count of this.counts.values()) {
      total += count;
    }
    return total;
  }

  /**
   * True counts of every kind that occurred, in taxonomy order
   */
  issueCounts(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const kind of ISSUE_KINDS) {
      const count = this.counts.get(kind);
      if (count !== undefined) {
        result[kind] = count;
      }
    }
    return result;
  }

  /**
   * Retained issues of every kind that occurred, in taxonomy order
   */
  validations(): Record<string, Issue[]> {
    const result: Record<string, Issue[]> = {};
    for (const kind of ISSUE_KINDS) {
      if (this.counts.has(kind)) {
        result[kind] = [...(this.retained.get(kind) ?? [])];
      }
    }
    return result;
  }
}
