/**
 * Stop Time Interpolation
 *
 * Fills arrival/departure times of intermediate stop_times that omit them.
 * Every maximal run of untimed entries bounded by two timed entries
 * is filled from the departure of the first anchor to the arrival of the
 * second:
 *
 * - proportionally to distance traveled, when distances are known for the
 *   whole run, non-decreasing, and span a non-zero length;
 * - otherwise uniformly by stop count.
 *
 * Times are whole seconds and non-decreasing within a run. A run whose
 * closing entry arrives before the opening entry departs is left unfilled:
 * no non-decreasing assignment exists. The kinematic check then compares the
 * two bounding entries directly.
 *
 * An anchor carries both arrival and departure. A trip is complete when its
 * first and last entries are anchors; untimed entries before the first timed
 * entry or after the last one cannot be interpolated and stay undefined.
 */

import { haversineDistance } from './geo-utils.js';
import type { ModelIndex } from './model-index.js';
import type { StopTime, Trip } from './types/feed.js';

// ============================================================================
// Types
// ============================================================================

export interface ResolvedTime {
  readonly arrival?: number;
  readonly departure?: number;
  /** True when the time was produced by interpolation */
  readonly interpolated: boolean;
}

export type InterpolationMethod = 'proportional' | 'uniform' | 'unfilled';

/**
 * A filled (or unfillable) run, as indices into the stop_time sequence.
 * `start` and `end` are the bounding anchors.
 */
export interface InterpolationRun {
  readonly start: number;
  readonly end: number;
  readonly method: InterpolationMethod;
}

export interface InterpolationResult {
  readonly times: readonly ResolvedTime[];
  readonly runs: readonly InterpolationRun[];
  /** Whether the first and last entries are both anchors */
  readonly complete: boolean;
}

/** Distance spans at or below this are treated as degenerate (meters) */
const DEGENERATE_SPAN = 1e-6;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether a stop_time carries both its arrival and departure times
 */
export function isAnchor(stopTime: StopTime): boolean {
  return stopTime.arrivalTime !== undefined && stopTime.departureTime !== undefined;
}

/**
 * Whether a stop_time carries any time; a partly timed entry keeps its
 * time and bounds runs like an anchor, but cannot open or close a trip
 */
function isTimed(stopTime: StopTime): boolean {
  return stopTime.arrivalTime !== undefined || stopTime.departureTime !== undefined;
}

/**
 * A time given on one side only stands for both
 */
function anchorTime(stopTime: StopTime): ResolvedTime {
  return {
    arrival: stopTime.arrivalTime ?? stopTime.departureTime,
    departure: stopTime.departureTime ?? stopTime.arrivalTime,
    interpolated: false,
  };
}

function canUseDistances(
  distances: readonly number[] | undefined,
  start: number,
  end: number
): distances is readonly number[] {
  if (distances === undefined || distances.length <= end) {
    return false;
  }
  for (let k = start; k <= end; k++) {
    if (!Number.isFinite(distances[k])) return false;
    if (k > start && distances[k] < distances[k - 1]) return false;
  }
  return distances[end] - distances[start] > DEGENERATE_SPAN;
}

function uniformFill(start: number, end: number, from: number, to: number): number[] {
  const filled: number[] = [];
  const steps = end - start;
  for (let k = start + 1; k < end; k++) {
    filled.push(Math.round(from + ((to - from) * (k - start)) / steps));
  }
  return filled;
}

function proportionalFill(
  distances: readonly number[],
  start: number,
  end: number,
  from: number,
  to: number
): number[] {
  const origin = distances[start];
  const span = distances[end] - origin;
  const filled: number[] = [];
  for (let k = start + 1; k < end; k++) {
    filled.push(Math.round(from + ((to - from) * (distances[k] - origin)) / span));
  }
  return filled;
}

function isNonDecreasing(values: readonly number[], from: number, to: number): boolean {
  let previous = from;
  for (const value of values) {
    if (value < previous) return false;
    previous = value;
  }
  return previous <= to;
}

// ============================================================================
// Interpolation
// ============================================================================

/**
 * Resolve the times of an ordered stop_time sequence
 *
 * @param stopTimes - Stop times of one trip, in stop_sequence order
 * @param distances - Distance traveled at each stop_time, same length, if known
 */
export function interpolateStopTimes(
  stopTimes: readonly StopTime[],
  distances?: readonly number[]
): InterpolationResult {
  const times: ResolvedTime[] = stopTimes.map(st =>
    isTimed(st) ? anchorTime(st) : { interpolated: false }
  );
  const runs: InterpolationRun[] = [];

  let previousAnchor = -1;
  for (let index = 0; index < stopTimes.length; index++) {
    if (!isTimed(stopTimes[index])) continue;

    if (previousAnchor >= 0 && index - previousAnchor > 1) {
      const from = times[previousAnchor].departure ?? 0;
      const to = times[index].arrival ?? 0;

      if (to < from) {
        runs.push({ start: previousAnchor, end: index, method: 'unfilled' });
      } else {
        let method: InterpolationMethod = 'uniform';
        let filled = uniformFill(previousAnchor, index, from, to);

        if (canUseDistances(distances, previousAnchor, index)) {
          const proportional = proportionalFill(distances, previousAnchor, index, from, to);
          if (isNonDecreasing(proportional, from, to)) {
            method = 'proportional';
            filled = proportional;
          }
        }

        filled.forEach((time, offset) => {
          times[previousAnchor + 1 + offset] = { arrival: time, departure: time, interpolated: true };
        });
        runs.push({ start: previousAnchor, end: index, method });
      }
    }

    previousAnchor = index;
  }

  const first = stopTimes.at(0);
  const last = stopTimes.at(-1);
  const complete = first !== undefined && last !== undefined && isAnchor(first) && isAnchor(last);

  return { times, runs, complete };
}

/**
 * Distance traveled at each stop_time of a trip
 *
 * The stop_times' own shape_dist_traveled when every one has it; otherwise
 * each stop is projected on the nearest vertex of the trip's shape.
 * `undefined` when neither is possible.
 */
export function tripDistances(
  index: ModelIndex,
  trip: Trip,
  stopTimes: readonly StopTime[]
): number[] | undefined {
  const declared: number[] = [];
  for (const st of stopTimes) {
    if (st.shapeDistTraveled === undefined) break;
    declared.push(st.shapeDistTraveled);
  }
  if (declared.length === stopTimes.length) {
    return declared;
  }

  const shape = index.shapeOf(trip);
  if (shape === undefined || shape.points.length === 0) {
    return undefined;
  }

  const projected: number[] = [];
  for (const st of stopTimes) {
    const stop = index.stops.get(st.stopId);
    if (stop?.latitude === undefined || stop.longitude === undefined) {
      return undefined;
    }
    const position = { lat: stop.latitude, lon: stop.longitude };

    let nearest = 0;
    let nearestDistance = Infinity;
    shape.points.forEach((point, vertex) => {
      const distance = haversineDistance(position, { lat: point.latitude, lon: point.longitude });
      if (distance < nearestDistance) {
        nearestDistance = distance;
        nearest = vertex;
      }
    });
    projected.push(shape.cumulativeDistances[nearest]);
  }
  return projected;
}

/**
 * Resolved times of a trip, interpolated where possible
 */
export function resolveTripTimes(index: ModelIndex, trip: Trip): InterpolationResult {
  const stopTimes = index.stopTimesOf(trip.id);
  return interpolateStopTimes(stopTimes, tripDistances(index, trip, stopTimes));
}
