/**
 * Feed Checks
 *
 * The ordered check registry. Every check the engine runs is listed here,
 * once, in the order its issues are produced:
 *
 * - structure.ts        → duplicate ids, file presence, sub folder
 * - references.ts       → foreign keys
 * - stops.ts            → unused stops, duplicate stops, stop parents
 * - duration-distance.ts → kinematic plausibility between stops
 * - fields.ts           → names, identifiers, coordinates, route types
 * - shapes.ts           → shape references
 * - metadata-format.ts  → agency, feed info, fares, calendar presence
 * - stop-times.ts       → sequences, stop durations, interpolation anchors
 */

import type { Check } from '../core/types/validators.js';
import { durationDistanceCheck } from './duration-distance.js';
import { coordinatesCheck, identifierCheck, missingNameCheck, routeTypeCheck } from './fields.js';
import { agencyCheck, calendarCheck, fareAttributesCheck, feedInfoCheck } from './metadata-format.js';
import { invalidReferenceCheck } from './references.js';
import { shapesCheck } from './shapes.js';
import { interpolationAnchorCheck, stopTimesCheck, unusableTripCheck } from './stop-times.js';
import { duplicateStopsCheck, stopParentCheck, unusedStopCheck } from './stops.js';
import { duplicateObjectIdCheck, filePresenceCheck, subFolderCheck } from './structure.js';

export const CHECKS: readonly Check[] = Object.freeze([
  duplicateObjectIdCheck,
  invalidReferenceCheck,
  filePresenceCheck,
  subFolderCheck,
  unusedStopCheck,
  durationDistanceCheck,
  missingNameCheck,
  identifierCheck,
  coordinatesCheck,
  routeTypeCheck,
  shapesCheck,
  agencyCheck,
  calendarCheck,
  duplicateStopsCheck,
  fareAttributesCheck,
  feedInfoCheck,
  stopTimesCheck,
  interpolationAnchorCheck,
  unusableTripCheck,
  stopParentCheck,
]);

export {
  duplicateObjectIdCheck,
  invalidReferenceCheck,
  filePresenceCheck,
  subFolderCheck,
  unusedStopCheck,
  durationDistanceCheck,
  missingNameCheck,
  identifierCheck,
  coordinatesCheck,
  routeTypeCheck,
  shapesCheck,
  agencyCheck,
  calendarCheck,
  duplicateStopsCheck,
  fareAttributesCheck,
  feedInfoCheck,
  stopTimesCheck,
  interpolationAnchorCheck,
  unusableTripCheck,
  stopParentCheck,
};
export { classifySegment, type Segment } from './duration-distance.js';
export { normalizeStopName } from './stops.js';
export { MANDATORY_FILES, OPTIONAL_FILES } from './structure.js';
export { isValidCurrency, isValidHttpUrl, isValidLanguage, isValidTimezone } from './codes.js';
