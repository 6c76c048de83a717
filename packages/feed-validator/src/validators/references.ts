/**
 * Referential Integrity
 *
 * Every foreign key between tables must resolve. One issue is raised per
 * missing identifier and target kind, naming the first object that refers
 * to it; a feed with thousands of stop_times pointing at one missing stop
 * gets one issue, not thousands.
 *
 * A reference is only checked when its target table decoded: a missing or
 * broken table is reported once by the model index, not once per row.
 */

import type { ModelIndex } from '../core/model-index.js';
import { routeRef, stopRef, tripRef } from '../core/objects.js';
import { recordsOf } from '../core/types/feed.js';
import { createIssue, type ObjectType, type RelatedObject } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

interface Reference {
  readonly id: string;
  readonly target: ObjectType;
  readonly details: string;
  readonly referrer: RelatedObject;
}

/**
 * Identifiers a reference can resolve to, per target kind; kinds whose
 * table did not decode are absent and never checked
 */
function knownIds(index: ModelIndex): Map<ObjectType, ReadonlySet<string>> {
  const { tables } = index.raw;
  const known = new Map<ObjectType, ReadonlySet<string>>();

  if (index.isLoaded('trips')) known.set('trip', new Set(index.trips.keys()));
  if (index.isLoaded('stops')) known.set('stop', new Set(index.stops.keys()));
  if (index.isLoaded('routes')) known.set('route', new Set(index.routes.keys()));
  if (index.isLoaded('fare_attributes')) known.set('fare', new Set(index.fareAttributes.keys()));
  if (index.isLoaded('agency')) {
    known.set(
      'agency',
      new Set(index.agencies.flatMap(agency => (agency.id === undefined ? [] : [agency.id])))
    );
  }
  if (index.isLoaded('calendar') || index.isLoaded('calendar_dates')) {
    known.set(
      'calendar',
      new Set([
        ...recordsOf(tables.calendar).map(calendar => calendar.id),
        ...recordsOf(tables.calendar_dates).map(date => date.serviceId),
      ])
    );
  }

  return known;
}

function* references(index: ModelIndex): Generator<Reference> {
  const { tables } = index.raw;

  for (const st of recordsOf(tables.stop_times)) {
    const referrer: RelatedObject = {
      id: st.tripId,
      objectType: 'stop-time',
      name: `stop_sequence ${st.stopSequence}`,
    };
    yield {
      id: st.tripId,
      target: 'trip',
      details: 'The trip is referenced by a stop time but does not exist',
      referrer,
    };
    yield {
      id: st.stopId,
      target: 'stop',
      details: 'The stop is referenced by a stop time but does not exist',
      referrer,
    };
  }

  for (const trip of recordsOf(tables.trips)) {
    yield {
      id: trip.serviceId,
      target: 'calendar',
      details: 'The service is referenced by a trip but does not exist',
      referrer: tripRef(trip),
    };
    yield {
      id: trip.routeId,
      target: 'route',
      details: 'The route is referenced by a trip but does not exist',
      referrer: tripRef(trip),
    };
  }

  for (const route of recordsOf(tables.routes)) {
    if (route.agencyId !== undefined) {
      yield {
        id: route.agencyId,
        target: 'agency',
        details: 'The agency is referenced by a route but does not exist',
        referrer: routeRef(route),
      };
    }
  }

  for (const stop of recordsOf(tables.stops)) {
    if (stop.parentStation !== undefined) {
      yield {
        id: stop.parentStation,
        target: 'stop',
        details: "The stop is referenced as a stop's parent_station but does not exist",
        referrer: stopRef(stop),
      };
    }
  }

  for (const rule of recordsOf(tables.fare_rules)) {
    const referrer: RelatedObject = { id: rule.fareId, objectType: 'fare' };
    yield {
      id: rule.fareId,
      target: 'fare',
      details: 'The fare is referenced by a fare rule but does not exist',
      referrer,
    };
    if (rule.routeId !== undefined) {
      yield {
        id: rule.routeId,
        target: 'route',
        details: 'The route is referenced by a fare rule but does not exist',
        referrer,
      };
    }
  }
}

export const invalidReferenceCheck: Check = {
  name: 'invalid-reference',
  requires: [],
  domain: 'InvalidReference',
  *run(index) {
    const known = knownIds(index);
    const reported = new Set<string>();

    for (const reference of references(index)) {
      const ids = known.get(reference.target);
      if (ids === undefined || ids.has(reference.id)) continue;

      const key = `${reference.target}\u0000${reference.id}`;
      if (reported.has(key)) continue;
      reported.add(key);

      yield createIssue('InvalidReference', reference.id, {
        objectType: reference.target,
        relatedObjects: [reference.referrer],
        details: reference.details,
      });
    }
  },
};
