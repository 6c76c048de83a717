/**
 * Issue Taxonomy
 *
 * Closed set of issue kinds. Severity is a property of the kind, never of an
 * individual issue: ISSUE_SEVERITY is the only place it is decided, and
 * `Issue<K>` types `severity` as the literal that table gives for K.
 */

import type { FeatureCollection, Geometry } from 'geojson';

// ============================================================================
// Severity
// ============================================================================

export const SEVERITIES = ['Fatal', 'Error', 'Warning', 'Information'] as const;

/**
 * Fatal: the archive or model is unusable.
 * Error: the feed violates the GTFS reference.
 * Warning: not a violation, but most likely wrong.
 * Information: advisory.
 */
export type Severity = (typeof SEVERITIES)[number];

// ============================================================================
// Issue Kinds
// ============================================================================

/**
 * Declaration order is the order of `validations` in a report
 */
export const ISSUE_SEVERITY = {
  UnusedStop: 'Information',
  Slow: 'Information',
  ExcessiveSpeed: 'Information',
  NegativeTravelTime: 'Warning',
  CloseStops: 'Information',
  NullDuration: 'Warning',
  InvalidReference: 'Fatal',
  InvalidArchive: 'Fatal',
  MissingName: 'Warning',
  MissingId: 'Error',
  MissingCoordinates: 'Warning',
  InvalidCoordinates: 'Error',
  InvalidRouteType: 'Information',
  MissingUrl: 'Warning',
  InvalidUrl: 'Warning',
  InvalidTimezone: 'Error',
  DuplicateStops: 'Information',
  MissingPrice: 'Error',
  InvalidCurrency: 'Error',
  InvalidTransfers: 'Error',
  InvalidTransferDuration: 'Error',
  MissingLanguage: 'Warning',
  InvalidLanguage: 'Warning',
  DuplicateObjectId: 'Warning',
  UnloadableModel: 'Fatal',
  MissingMandatoryFile: 'Fatal',
  ExtraFile: 'Information',
  ImpossibleToInterpolateStopTimes: 'Error',
  InvalidStopLocationTypeInTrip: 'Warning',
  InvalidStopParent: 'Warning',
  IdNotAscii: 'Warning',
  InvalidShapeId: 'Error',
  UnusedShapeId: 'Information',
  NoShape: 'Information',
  DuplicateStopSequence: 'Error',
  NegativeStopDuration: 'Warning',
  UnusableTrip: 'Error',
  SubFolder: 'Error',
  NoCalendar: 'Warning',
} as const satisfies Record<string, Severity>;

export type IssueKind = keyof typeof ISSUE_SEVERITY;

export type SeverityOf<K extends IssueKind> = (typeof ISSUE_SEVERITY)[K];

function isIssueKindKey(key: string): key is IssueKind {
  return Object.prototype.hasOwnProperty.call(ISSUE_SEVERITY, key);
}

export const ISSUE_KINDS: readonly IssueKind[] = Object.keys(ISSUE_SEVERITY).filter(isIssueKindKey);

export function isIssueKind(value: string): value is IssueKind {
  return isIssueKindKey(value);
}

export function severityOf<K extends IssueKind>(kind: K): SeverityOf<K> {
  return ISSUE_SEVERITY[kind];
}

// ============================================================================
// Issue
// ============================================================================

/**
 * Kind of GTFS object an issue points at
 */
export type ObjectType =
  | 'agency'
  | 'stop'
  | 'route'
  | 'trip'
  | 'calendar'
  | 'shape'
  | 'fare'
  | 'feed-info'
  | 'stop-time'
  | 'file';

export interface RelatedObject {
  readonly id: string;
  readonly objectType?: ObjectType;
  readonly name?: string;
}

/**
 * A line of a file that could not be decoded
 */
export interface RelatedLine {
  readonly lineNumber: number;
  readonly headers: readonly string[];
  readonly values: readonly string[];
}

export interface RelatedFile {
  readonly fileName: string;
  readonly line?: RelatedLine;
}

export type IssueGeometry = FeatureCollection<Geometry | null>;

/**
 * An issue found in the feed. `severity` is typed from `kind`, so for a
 * known kind the pair cannot disagree.
 */
export interface Issue<K extends IssueKind = IssueKind> {
  readonly severity: SeverityOf<K>;
  readonly kind: K;
  /** Identifier of the object causing the issue */
  readonly objectId: string;
  readonly objectType?: ObjectType;
  readonly objectName?: string;
  readonly relatedObjects: readonly RelatedObject[];
  readonly details?: string;
  readonly relatedFile?: RelatedFile;
  readonly geojson?: IssueGeometry;
}

export interface IssueOptions {
  readonly objectType?: ObjectType;
  readonly objectName?: string;
  readonly relatedObjects?: readonly RelatedObject[];
  readonly details?: string;
  readonly relatedFile?: RelatedFile;
}

/**
 * Create an issue; severity comes from the kind.
 */
export function createIssue<K extends IssueKind>(
  kind: K,
  objectId: string,
  options: IssueOptions = {}
): Issue<K> {
  return {
    severity: severityOf(kind),
    kind,
    objectId,
    ...(options.objectType !== undefined && { objectType: options.objectType }),
    ...(options.objectName !== undefined && { objectName: options.objectName }),
    relatedObjects: options.relatedObjects ?? [],
    ...(options.details !== undefined && { details: options.details }),
    ...(options.relatedFile !== undefined && { relatedFile: options.relatedFile }),
  };
}

/**
 * Copy of an issue with geometry attached
 */
export function withGeometry<I extends Issue>(issue: I, geojson: IssueGeometry): I {
  return { ...issue, geojson };
}
