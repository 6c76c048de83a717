/**
 * Stop Time Checks
 *
 * Ordering and timing of each trip's stop_times, and the location types
 * they may visit.
 */

import { isAnchor } from '../core/interpolation.js';
import { stopRef, subject, tripRef } from '../core/objects.js';
import { createIssue, type RelatedObject } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

/** Related trips kept per misused stop */
export const MAX_RELATED_TRIPS = 20;

export const stopTimesCheck: Check = {
  name: 'stop-times',
  requires: ['stops', 'trips', 'stop_times'],
  domain: 'DuplicateStopSequence',
  *run(index) {
    const misused = new Map<string, RelatedObject[]>();

    for (const trip of index.trips.values()) {
      const stopTimes = index.stopTimesOf(trip.id);

      for (const st of stopTimes) {
        const stop = index.stops.get(st.stopId);
        if (stop === undefined || stop.locationType === 'stop-point') continue;
        const trips = misused.get(stop.id) ?? [];
        if (trips.length < MAX_RELATED_TRIPS) {
          trips.push(tripRef(trip));
        }
        misused.set(stop.id, trips);
      }

      // stop_times are sorted, so equal sequence numbers are adjacent
      const sharing = new Set<number>();
      for (let i = 1; i < stopTimes.length; i++) {
        if (stopTimes[i].stopSequence === stopTimes[i - 1].stopSequence) {
          sharing.add(i - 1);
          sharing.add(i);
        }
      }
      if (sharing.size > 0) {
        const related: RelatedObject[] = [];
        for (const position of [...sharing].sort((a, b) => a - b)) {
          const stop = index.stops.get(stopTimes[position].stopId);
          if (stop !== undefined) related.push(stopRef(stop));
        }
        yield createIssue('DuplicateStopSequence', trip.id, {
          ...subject(tripRef(trip)),
          relatedObjects: related,
        });
      }

      for (const st of stopTimes) {
        if (
          st.arrivalTime !== undefined &&
          st.departureTime !== undefined &&
          st.arrivalTime > st.departureTime
        ) {
          yield createIssue('NegativeStopDuration', trip.id, {
            ...subject(tripRef(trip)),
            details: `Departure time before arrival time at stop sequence ${st.stopSequence}`,
          });
        }
      }
    }

    for (const [stopId, trips] of misused) {
      const stop = index.stops.get(stopId);
      if (stop === undefined) continue;
      yield createIssue('InvalidStopLocationTypeInTrip', stop.id, {
        ...subject(stopRef(stop)),
        relatedObjects: trips,
        details: `A ${stop.locationType} cannot be referenced by a stop time`,
      });
    }
  },
};

export const interpolationAnchorCheck: Check = {
  name: 'interpolation-anchors',
  requires: ['trips', 'stop_times'],
  domain: 'ImpossibleToInterpolateStopTimes',
  *run(index) {
    for (const trip of index.trips.values()) {
      const stopTimes = index.stopTimesOf(trip.id);
      const first = stopTimes.at(0);
      const last = stopTimes.at(-1);
      if (first === undefined || last === undefined) continue;

      if (!isAnchor(first) || !isAnchor(last)) {
        yield createIssue('ImpossibleToInterpolateStopTimes', trip.id, {
          ...subject(tripRef(trip)),
          details:
            'The first and last stop time of a trip need both an arrival and a departure time to interpolate the others',
        });
      }
    }
  },
};

export const unusableTripCheck: Check = {
  name: 'unusable-trip',
  requires: ['trips', 'stop_times'],
  domain: 'UnusableTrip',
  *run(index) {
    for (const trip of index.trips.values()) {
      if (index.stopTimesOf(trip.id).length === 1) {
        yield createIssue('UnusableTrip', trip.id, {
          ...subject(tripRef(trip)),
          details: 'A trip needs at least two stop times',
        });
      }
    }
  },
};
