/**
 * Field Checks
 *
 * Presence and hygiene of the fields every object needs: names,
 * identifiers, coordinates and route types.
 */

import { standardModeOf } from '../config/rules.js';
import { isValidCoordinate } from '../core/geo-utils.js';
import type { ModelIndex } from '../core/model-index.js';
import {
  agencyRef,
  feedInfoRef,
  routeName,
  routeRef,
  stopRef,
  subject,
  tripName,
} from '../core/objects.js';
import { recordsOf, type Stop } from '../core/types/feed.js';
import { createIssue, type ObjectType } from '../core/types/issues.js';
import type { Check } from '../core/types/validators.js';

// =============================================================================
// Names
// =============================================================================

/** Location types a rider sees, which therefore need a name */
const NAMED_LOCATION_TYPES: ReadonlySet<Stop['locationType']> = new Set([
  'stop-point',
  'stop-area',
  'station-entrance',
]);

export const missingNameCheck: Check = {
  name: 'missing-name',
  requires: [],
  domain: 'MissingName',
  *run(index) {
    for (const route of index.routes.values()) {
      if (route.shortName.length === 0 && route.longName.length === 0) {
        yield createIssue('MissingName', route.id, {
          ...subject(routeRef(route)),
          details: 'The route has neither a short name nor a long name',
        });
      }
    }
    for (const stop of index.stops.values()) {
      if (stop.name.length === 0 && NAMED_LOCATION_TYPES.has(stop.locationType)) {
        yield createIssue('MissingName', stop.id, subject(stopRef(stop)));
      }
    }
    for (const agency of index.agencies) {
      if (agency.name.length === 0) {
        yield createIssue('MissingName', agency.id ?? '', subject(agencyRef(agency)));
      }
    }
    for (const feedInfo of index.feedInfo) {
      if (feedInfo.publisherName.length === 0) {
        yield createIssue('MissingName', '', {
          ...subject(feedInfoRef(feedInfo)),
          details: 'The feed publisher name is missing',
        });
      }
    }
  },
};

// =============================================================================
// Identifiers
// =============================================================================

const NON_ASCII = /[^\u0000-\u007F]/;

interface Identified {
  readonly id: string;
  readonly objectType: ObjectType;
  readonly name?: string;
}

function* identifiedObjects(index: ModelIndex): Generator<Identified> {
  const { tables } = index.raw;
  for (const route of recordsOf(tables.routes)) {
    yield { id: route.id, objectType: 'route', name: routeName(route) };
  }
  for (const trip of recordsOf(tables.trips)) {
    yield { id: trip.id, objectType: 'trip', name: tripName(trip) };
  }
  for (const calendar of recordsOf(tables.calendar)) {
    yield { id: calendar.id, objectType: 'calendar' };
  }
  for (const stop of recordsOf(tables.stops)) {
    yield { id: stop.id, objectType: 'stop', name: stop.name };
  }
  for (const shape of index.shapes.values()) {
    yield { id: shape.id, objectType: 'shape' };
  }
}

export const identifierCheck: Check = {
  name: 'identifiers',
  requires: [],
  domain: 'MissingId',
  *run(index) {
    for (const object of identifiedObjects(index)) {
      if (object.id.length === 0) {
        yield createIssue('MissingId', '', {
          objectType: object.objectType,
          ...(object.name !== undefined && { objectName: object.name }),
        });
      }
    }

    // agency_id is only required when there is more than one agency
    if (index.agencies.length > 1) {
      for (const agency of index.agencies) {
        if (agency.id === undefined || agency.id.length === 0) {
          yield createIssue('MissingId', '', subject(agencyRef(agency)));
        }
      }
    }

    const reported = new Set<string>();
    const ids: Identified[] = [
      ...identifiedObjects(index),
      ...index.agencies.flatMap((agency): Identified[] =>
        agency.id === undefined ? [] : [{ id: agency.id, objectType: 'agency', name: agency.name }]
      ),
      ...[...index.fareAttributes.keys()].map((id): Identified => ({ id, objectType: 'fare' })),
    ];
    for (const object of ids) {
      const key = `${object.objectType}\u0000${object.id}`;
      if (!NON_ASCII.test(object.id) || reported.has(key)) continue;
      reported.add(key);
      yield createIssue('IdNotAscii', object.id, {
        objectType: object.objectType,
        ...(object.name !== undefined && { objectName: object.name }),
        details: 'The identifier contains non-ASCII characters',
      });
    }
  },
};

// =============================================================================
// Coordinates
// =============================================================================

/** Location types for which GTFS makes coordinates optional */
const COORDINATES_OPTIONAL: ReadonlySet<Stop['locationType']> = new Set([
  'generic-node',
  'boarding-area',
]);

/**
 * A zero coordinate is a placeholder, not a position
 */
function isMissing(value: number | undefined): boolean {
  return value === undefined || value === 0;
}

function missingCoordinatesDetails(stop: Stop): string {
  const lat = isMissing(stop.latitude);
  const lon = isMissing(stop.longitude);
  if (lat && lon) return 'Latitude and longitude are missing';
  return lat ? 'Latitude is missing' : 'Longitude is missing';
}

export const coordinatesCheck: Check = {
  name: 'coordinates',
  requires: [],
  domain: 'InvalidCoordinates',
  *run(index) {
    for (const stop of index.stops.values()) {
      if (isMissing(stop.latitude) || isMissing(stop.longitude)) {
        if (!COORDINATES_OPTIONAL.has(stop.locationType)) {
          yield createIssue('MissingCoordinates', stop.id, {
            ...subject(stopRef(stop)),
            details: missingCoordinatesDetails(stop),
          });
        }
      }
      if (
        stop.latitude !== undefined &&
        stop.longitude !== undefined &&
        !isValidCoordinate(stop.latitude, stop.longitude)
      ) {
        yield createIssue('InvalidCoordinates', stop.id, {
          ...subject(stopRef(stop)),
          details: `(${stop.latitude}, ${stop.longitude}) is outside WGS84 bounds`,
        });
      }
    }

    for (const shape of index.shapes.values()) {
      if (shape.points.some(point => point.latitude === 0 || point.longitude === 0)) {
        yield createIssue('MissingCoordinates', shape.id, { objectType: 'shape' });
      }
      if (shape.points.some(point => !isValidCoordinate(point.latitude, point.longitude))) {
        yield createIssue('InvalidCoordinates', shape.id, { objectType: 'shape' });
      }
    }
  },
};

// =============================================================================
// Route Type
// =============================================================================

export const routeTypeCheck: Check = {
  name: 'route-type',
  requires: [],
  domain: 'InvalidRouteType',
  *run(index) {
    for (const route of index.routes.values()) {
      if (standardModeOf(route.routeType) === undefined) {
        yield createIssue('InvalidRouteType', route.id, {
          ...subject(routeRef(route)),
          details: `The route type '${route.routeType}' is not part of the main GTFS specification`,
        });
      }
    }
  },
};
