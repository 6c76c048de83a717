/**
 * Duration / Distance Check
 *
 * Walks each trip's consecutive stop_times, with intermediate times filled
 * by interpolation, and compares the haversine distance between the stops
 * with the scheduled travel time. The first matching condition wins:
 *
 *   1. distance < closeStopsDistance             → CloseStops
 *   2. duration < 0                              → NegativeTravelTime
 *   3. duration = 0, distance > nullDuration     → NullDuration
 *   4. speed > ceiling of the route's mode       → ExcessiveSpeed
 *   5. speed < slowSpeed                         → Slow
 *
 * Pairs where either side has no time (outside the interpolable span) or no
 * coordinates are skipped. A run that cannot be filled because its closing
 * entry arrives before its opening one departs is checked as a single
 * segment between those two entries.
 */

import { transportModeOf, type RuleConfiguration } from '../config/rules.js';
import { haversineDistance, speedKmh } from '../core/geo-utils.js';
import { resolveTripTimes } from '../core/interpolation.js';
import type { ModelIndex } from '../core/model-index.js';
import { routeRef, stopRef, subject, tripRef } from '../core/objects.js';
import type { Route, Stop, Trip } from '../core/types/feed.js';
import { createIssue, type Issue, type IssueKind } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

export interface Segment {
  /** Meters */
  readonly distance: number;
  /** Seconds */
  readonly duration: number;
}

type SegmentKind = Extract<
  IssueKind,
  'CloseStops' | 'NegativeTravelTime' | 'NullDuration' | 'ExcessiveSpeed' | 'Slow'
>;

/**
 * Classify one segment; `undefined` when nothing is wrong
 */
export function classifySegment(
  segment: Segment,
  maxSpeed: number,
  rules: RuleConfiguration
): SegmentKind | undefined {
  const { distance, duration } = segment;

  if (distance < rules.closeStopsDistance) return 'CloseStops';
  if (duration < 0) return 'NegativeTravelTime';
  if (duration === 0) {
    return distance > rules.nullDurationDistance ? 'NullDuration' : undefined;
  }

  const speed = speedKmh(distance, duration);
  if (speed > maxSpeed) return 'ExcessiveSpeed';
  if (speed < rules.slowSpeed) return 'Slow';
  return undefined;
}

function describe(kind: SegmentKind, segment: Segment, maxSpeed: number): string {
  const meters = segment.distance.toFixed(0);
  const seconds = segment.duration;
  switch (kind) {
    case 'CloseStops':
      return `The stops are ${segment.distance.toFixed(1)} meters apart`;
    case 'NegativeTravelTime':
      return `The arrival is ${-seconds} seconds before the departure from the previous stop`;
    case 'NullDuration':
      return `${meters} meters traveled in 0 seconds`;
    case 'ExcessiveSpeed':
      return `computed speed ${speedKmh(segment.distance, seconds).toFixed(2)} km/h exceeds the maximum of ${maxSpeed} km/h (${meters} meters in ${seconds} seconds)`;
    case 'Slow':
      return `computed speed ${speedKmh(segment.distance, seconds).toFixed(2)} km/h (${meters} meters in ${seconds} seconds)`;
  }
}

function positionOf(stop: Stop | undefined): { lat: number; lon: number } | undefined {
  if (stop?.latitude === undefined || stop.longitude === undefined) {
    return undefined;
  }
  return { lat: stop.latitude, lon: stop.longitude };
}

function segmentIssue(
  index: ModelIndex,
  trip: Trip,
  route: Route,
  leg: { fromStopId: string; toStopId: string; departure: number; arrival: number },
  maxSpeed: number,
  rules: RuleConfiguration
): Issue | undefined {
  const from = index.stops.get(leg.fromStopId);
  const to = index.stops.get(leg.toStopId);
  const a = positionOf(from);
  const b = positionOf(to);
  if (from === undefined || to === undefined || a === undefined || b === undefined) return undefined;

  const segment: Segment = {
    distance: haversineDistance(a, b),
    duration: leg.arrival - leg.departure,
  };
  const kind = classifySegment(segment, maxSpeed, rules);
  if (kind === undefined) return undefined;

  return createIssue(kind, from.id, {
    ...subject(stopRef(from)),
    relatedObjects: [stopRef(to), tripRef(trip), routeRef(route)],
    details: describe(kind, segment, maxSpeed),
  });
}

function* tripSegments(
  index: ModelIndex,
  trip: Trip,
  route: Route,
  rules: RuleConfiguration
): Generator<Issue> {
  const stopTimes = index.stopTimesOf(trip.id);
  const { times, runs } = resolveTripTimes(index, trip);
  const maxSpeed = rules.maxSpeeds[transportModeOf(route.routeType)];

  for (let i = 1; i < stopTimes.length; i++) {
    const departure = times[i - 1].departure;
    const arrival = times[i].arrival;
    if (departure === undefined || arrival === undefined) continue;

    const issue = segmentIssue(
      index,
      trip,
      route,
      { fromStopId: stopTimes[i - 1].stopId, toStopId: stopTimes[i].stopId, departure, arrival },
      maxSpeed,
      rules
    );
    if (issue !== undefined) yield issue;
  }

  // Runs left unfilled because the closing entry arrives before the opening
  // one departs: compare the two bounding entries directly
  for (const run of runs) {
    if (run.method !== 'unfilled') continue;
    const departure = times[run.start].departure;
    const arrival = times[run.end].arrival;
    if (departure === undefined || arrival === undefined) continue;

    const issue = segmentIssue(
      index,
      trip,
      route,
      { fromStopId: stopTimes[run.start].stopId, toStopId: stopTimes[run.end].stopId, departure, arrival },
      maxSpeed,
      rules
    );
    if (issue !== undefined) yield issue;
  }
}

export const durationDistanceCheck: Check = {
  name: 'duration-distance',
  requires: ['stops', 'routes', 'trips', 'stop_times'],
  domain: 'ExcessiveSpeed',
  *run(index, rules) {
    for (const trip of index.trips.values()) {
      const route = index.routeOf(trip);
      // Trips of unknown routes are reported as invalid references
      if (route === undefined) continue;
      yield* tripSegments(index, trip, route, rules);
    }
  },
};
