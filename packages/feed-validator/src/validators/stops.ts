/**
 * Stop Checks
 *
 * Stops nobody uses, stops that duplicate each other, and parent_station
 * links between location types that cannot nest.
 */

import { haversineDistance } from '../core/geo-utils.js';
import { stopRef, subject } from '../core/objects.js';
import type { LocationType, Stop } from '../core/types/feed.js';
import { createIssue } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

// =============================================================================
// Unused Stops
// =============================================================================

/**
 * A stop is used when a stop_time or pathway references it, or when it is
 * an ancestor of a used stop.
 */
export const unusedStopCheck: Check = {
  name: 'unused-stop',
  requires: ['stops', 'stop_times'],
  domain: 'UnusedStop',
  *run(index) {
    const used = new Set<string>();
    const markUsed = (stopId: string): void => {
      let current = index.stops.get(stopId);
      // Stops higher than the current one in the hierarchy; guarded against cycles
      while (current !== undefined && !used.has(current.id)) {
        used.add(current.id);
        current = index.parentOf(current);
      }
    };

    for (const trip of index.trips.values()) {
      for (const st of index.stopTimesOf(trip.id)) {
        markUsed(st.stopId);
      }
    }
    for (const pathway of index.pathways) {
      markUsed(pathway.fromStopId);
      markUsed(pathway.toStopId);
    }

    for (const stop of index.stops.values()) {
      if (!used.has(stop.id)) {
        yield createIssue('UnusedStop', stop.id, {
          ...subject(stopRef(stop)),
          details: 'The stop is not used by any trip',
        });
      }
    }
  },
};

// =============================================================================
// Duplicate Stops
// =============================================================================

export function normalizeStopName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Whether two stops of the same kind and name are close enough to be the
 * same place; only stop points and stop areas qualify
 */
function tooClose(a: Stop, b: Stop, pointDistance: number, areaDistance: number): boolean {
  if (
    a.latitude === undefined ||
    a.longitude === undefined ||
    b.latitude === undefined ||
    b.longitude === undefined
  ) {
    return false;
  }
  const distance = haversineDistance(
    { lat: a.latitude, lon: a.longitude },
    { lat: b.latitude, lon: b.longitude }
  );
  switch (a.locationType) {
    case 'stop-point':
      return distance < pointDistance;
    case 'stop-area':
      return distance < areaDistance;
    default:
      return false;
  }
}

export const duplicateStopsCheck: Check = {
  name: 'duplicate-stops',
  requires: ['stops'],
  domain: 'DuplicateStops',
  *run(index, rules) {
    const groups = new Map<string, Stop[]>();
    for (const stop of index.stops.values()) {
      // Entrances of one station commonly share its name and position
      if (stop.locationType === 'station-entrance') continue;
      const key = `${stop.locationType}\u0000${normalizeStopName(stop.name)}`;
      const group = groups.get(key);
      if (group) {
        group.push(stop);
      } else {
        groups.set(key, [stop]);
      }
    }

    for (const group of groups.values()) {
      for (let i = 0; i < group.length; i++) {
        for (let j = i + 1; j < group.length; j++) {
          const a = group[i];
          const b = group[j];
          if (tooClose(a, b, rules.duplicateStopPointDistance, rules.duplicateStopAreaDistance)) {
            yield createIssue('DuplicateStops', a.id, {
              ...subject(stopRef(a)),
              relatedObjects: [stopRef(b)],
            });
          }
        }
      }
    }
  },
};

// =============================================================================
// Stop Parent
// =============================================================================

/**
 * Location type a stop's parent must have, `null` when it must have none
 */
function expectedParentType(locationType: LocationType): LocationType | null {
  switch (locationType) {
    case 'stop-point':
    case 'station-entrance':
    case 'generic-node':
      return 'stop-area';
    case 'boarding-area':
      return 'stop-point';
    case 'stop-area':
      return null;
  }
}

export const stopParentCheck: Check = {
  name: 'stop-parent',
  requires: ['stops'],
  domain: 'InvalidStopParent',
  *run(index) {
    for (const stop of index.stops.values()) {
      const expected = expectedParentType(stop.locationType);

      if (expected === null) {
        if (stop.parentStation !== undefined) {
          yield createIssue('InvalidStopParent', stop.id, {
            ...subject(stopRef(stop)),
            relatedObjects: [{ id: stop.parentStation, objectType: 'stop' }],
            details: 'A station cannot have a parent station',
          });
        }
        continue;
      }

      // Unresolved parents are reported as invalid references
      const parent = index.parentOf(stop);
      if (parent !== undefined && parent.locationType !== expected) {
        yield createIssue('InvalidStopParent', stop.id, {
          ...subject(stopRef(stop)),
          relatedObjects: [stopRef(parent)],
          details: `The parent of a ${stop.locationType} must be a ${expected}, not a ${parent.locationType}`,
        });
      }
    }
  },
};
