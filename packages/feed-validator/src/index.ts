/**
 * GTFS Feed Validator
 *
 * Loads a GTFS feed, runs the registered checks and reports issues with
 * feed metadata.
 *
 * @example
 * ```typescript
 * import { formatReport, validateInput } from 'feed-validator';
 *
 * const report = await validateInput('./feeds/city-bus.zip', { maxIssues: 100 });
 * console.log(formatReport(report, 'pretty-json'));
 * ```
 */

export * from './core/types/index.js';

export {
  invalidArchiveReport,
  validateFeed,
  validateInput,
  type Report,
  type ValidationOptions,
} from './core/engine.js';
export {
  FeedLoadError,
  ReportParseError,
  RulesConfigError,
  TableParseError,
} from './core/errors.js';
export {
  EARTH_RADIUS_METERS,
  cumulativeDistances,
  haversineDistance,
  isValidCoordinate,
  speedKmh,
  type GeoPoint,
} from './core/geo-utils.js';
export {
  interpolateStopTimes,
  resolveTripTimes,
  type InterpolationMethod,
  type InterpolationResult,
  type InterpolationRun,
  type ResolvedTime,
} from './core/interpolation.js';
export { DEFAULT_MAX_ISSUES, IssueCollector } from './core/issue-collector.js';
export {
  VALIDATOR_VERSION,
  formatFeedDate,
  summarizeMetadata,
  type DateRange,
  type Metadata,
} from './core/metadata.js';
export { ModelIndex, type Shape, type UnavailableTable } from './core/model-index.js';
export {
  REPORT_FORMATS,
  formatReport,
  isReportFormat,
  parseReport,
  reportSchema,
  type ReportDocument,
  type ReportFormat,
} from './core/report-format.js';
export { addIssueGeometry } from './core/visualization.js';
export { createLogger, type LogLevel, type LogMetadata, type Logger, type LoggerOptions } from './core/utils/logger.js';

export {
  DEFAULT_RULES,
  TRANSPORT_MODES,
  customRulesSchema,
  mergeRules,
  standardModeOf,
  transportModeOf,
  type CustomRules,
  type RuleConfiguration,
  type TransportMode,
} from './config/rules.js';

export * from './validators/index.js';
export * from './loader/index.js';
