/**
 * Core Types
 *
 * @module core/types
 */

export type {
  Agency,
  Availability,
  BikesAllowed,
  Calendar,
  CalendarDate,
  ExceptionType,
  FareAttribute,
  FareRule,
  FeedInfo,
  LocationType,
  Pathway,
  PickupDropOffType,
  RawFeed,
  RawTable,
  Route,
  ShapePoint,
  Stop,
  StopTime,
  TableLoadError,
  TableName,
  TableRecords,
  Trip,
} from './feed.js';
export { MANDATORY_TABLES, TABLE_NAMES, recordsOf, tableFileName } from './feed.js';

export type {
  Issue,
  IssueGeometry,
  IssueKind,
  IssueOptions,
  ObjectType,
  RelatedFile,
  RelatedLine,
  RelatedObject,
  Severity,
  SeverityOf,
} from './issues.js';
export {
  ISSUE_KINDS,
  ISSUE_SEVERITY,
  SEVERITIES,
  createIssue,
  isIssueKind,
  severityOf,
  withGeometry,
} from './issues.js';

export type { Check } from './validators.js';
