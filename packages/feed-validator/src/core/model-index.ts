/**
 * Model Index
 *
 * Cross-referenced, read-only view over a RawFeed. Each table becomes an
 * arena keyed by its identifier; relationships (trip → stop_times,
 * stop → parent, trip → shape, route → trips, fare → rules) are lookups by
 * identifier, never embedded references.
 *
 * Building never throws. Tables that are missing (when mandatory), failed to
 * decode, or cannot be linked at all are recorded as unavailable, and a
 * single Fatal UnloadableModel issue describes why. Checks that need an
 * unavailable table are skipped by the engine; everything else still runs
 * on the partial index.
 */

import { cumulativeDistances } from './geo-utils.js';
import {
  MANDATORY_TABLES,
  TABLE_NAMES,
  recordsOf,
  tableFileName,
  type Agency,
  type Calendar,
  type CalendarDate,
  type FareAttribute,
  type FareRule,
  type FeedInfo,
  type Pathway,
  type RawFeed,
  type Route,
  type ShapePoint,
  type Stop,
  type StopTime,
  type TableLoadError,
  type TableName,
  type Trip,
} from './types/feed.js';
import { createIssue, type Issue, type RelatedFile } from './types/issues.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A shape with its points in sequence order
 */
export interface Shape {
  readonly id: string;
  readonly points: readonly ShapePoint[];
  /**
   * Distance along the shape at each point: the points' own
   * shape_dist_traveled when all of them carry one, otherwise cumulative
   * haversine meters.
   */
  readonly cumulativeDistances: readonly number[];
}

/**
 * Why a table cannot be used
 */
export interface UnavailableTable {
  readonly table: TableName;
  readonly reason: string;
  readonly error?: TableLoadError;
}

// ============================================================================
// Helpers
// ============================================================================

function arena<T>(records: readonly T[], key: (record: T) => string): Map<string, T> {
  const map = new Map<string, T>();
  for (const record of records) {
    const id = key(record);
    // First record wins; repeats are reported by the duplicate id check
    if (!map.has(id)) {
      map.set(id, record);
    }
  }
  return map;
}

function groupBy<T>(records: readonly T[], key: (record: T) => string): Map<string, T[]> {
  const map = new Map<string, T[]>();
  for (const record of records) {
    const id = key(record);
    const group = map.get(id);
    if (group) {
      group.push(record);
    } else {
      map.set(id, [record]);
    }
  }
  return map;
}

function buildShape(id: string, points: readonly ShapePoint[]): Shape {
  const sorted = [...points].sort((a, b) => a.sequence - b.sequence);
  const declared = sorted.map(point => point.distTraveled);
  const allDeclared = declared.every((d): d is number => d !== undefined);

  return {
    id,
    points: sorted,
    cumulativeDistances: allDeclared
      ? sorted.map(point => point.distTraveled ?? 0)
      : cumulativeDistances(sorted.map(point => ({ lat: point.latitude, lon: point.longitude }))),
  };
}

function relatedFileOf(error: TableLoadError): RelatedFile {
  return {
    fileName: error.fileName,
    ...(error.lineNumber !== undefined && {
      line: {
        lineNumber: error.lineNumber,
        headers: error.headers ?? [],
        values: error.values ?? [],
      },
    }),
  };
}

// ============================================================================
// Model Index
// ============================================================================

export class ModelIndex {
  readonly raw: RawFeed;

  readonly agencies: readonly Agency[];
  readonly stops: ReadonlyMap<string, Stop>;
  readonly routes: ReadonlyMap<string, Route>;
  readonly trips: ReadonlyMap<string, Trip>;
  readonly calendars: ReadonlyMap<string, Calendar>;
  readonly calendarDates: ReadonlyMap<string, readonly CalendarDate[]>;
  readonly shapes: ReadonlyMap<string, Shape>;
  readonly fareAttributes: ReadonlyMap<string, FareAttribute>;
  readonly fareRules: readonly FareRule[];
  readonly feedInfo: readonly FeedInfo[];
  readonly pathways: readonly Pathway[];

  private readonly tripStopTimes: ReadonlyMap<string, readonly StopTime[]>;
  private readonly routeTrips: ReadonlyMap<string, readonly Trip[]>;
  private readonly fareRulesByFare: ReadonlyMap<string, readonly FareRule[]>;
  private readonly unavailableTables: ReadonlyMap<TableName, UnavailableTable>;

  /** Fatal issues raised while linking the model (at most one) */
  readonly buildIssues: readonly Issue[];

  private constructor(raw: RawFeed) {
    this.raw = raw;
    const { tables } = raw;

    this.agencies = recordsOf(tables.agency);
    this.stops = arena(recordsOf(tables.stops), stop => stop.id);
    this.routes = arena(recordsOf(tables.routes), route => route.id);
    this.trips = arena(recordsOf(tables.trips), trip => trip.id);
    this.calendars = arena(recordsOf(tables.calendar), calendar => calendar.id);
    this.calendarDates = groupBy(recordsOf(tables.calendar_dates), date => date.serviceId);
    this.fareAttributes = arena(recordsOf(tables.fare_attributes), fare => fare.id);
    this.fareRules = recordsOf(tables.fare_rules);
    this.feedInfo = recordsOf(tables.feed_info);
    this.pathways = recordsOf(tables.pathways);

    const shapes = new Map<string, Shape>();
    for (const [id, points] of groupBy(recordsOf(tables.shapes), point => point.id)) {
      shapes.set(id, buildShape(id, points));
    }
    this.shapes = shapes;

    const stopTimes = recordsOf(tables.stop_times);
    const linked = stopTimes.filter(st => this.trips.has(st.tripId) && this.stops.has(st.stopId));
    const byTrip = groupBy(linked, st => st.tripId);
    for (const sequence of byTrip.values()) {
      // Array.prototype.sort is stable: equal sequence numbers keep file order
      sequence.sort((a, b) => a.stopSequence - b.stopSequence);
    }
    this.tripStopTimes = byTrip;

    this.routeTrips = groupBy([...this.trips.values()], trip => trip.routeId);
    this.fareRulesByFare = groupBy(this.fareRules, rule => rule.fareId);

    const unavailable = new Map<TableName, UnavailableTable>();
    for (const table of TABLE_NAMES) {
      const state = tables[table];
      if (state.status === 'failed') {
        unavailable.set(table, { table, reason: state.error.message, error: state.error });
      } else if (state.status === 'missing' && MANDATORY_TABLES.includes(table)) {
        unavailable.set(table, { table, reason: `${tableFileName(table)} is missing` });
      }
    }
    if (!unavailable.has('stop_times') && stopTimes.length > 0 && linked.length === 0) {
      unavailable.set('stop_times', {
        table: 'stop_times',
        reason: 'no stop time references both a known trip and a known stop',
      });
    }
    this.unavailableTables = unavailable;
    this.buildIssues = unavailable.size > 0 ? [ModelIndex.unloadableIssue([...unavailable.values()])] : [];
  }

  /**
   * Index a raw feed
   */
  static build(raw: RawFeed): ModelIndex {
    return new ModelIndex(raw);
  }

  private static unloadableIssue(unavailable: readonly UnavailableTable[]): Issue {
    const firstError = unavailable.find(entry => entry.error !== undefined)?.error;

    return createIssue(
      'UnloadableModel',
      'A fatal error has occurred while loading the model, many rules have not been checked',
      {
        details: unavailable.map(entry => `${tableFileName(entry.table)}: ${entry.reason}`).join('; '),
        ...(firstError !== undefined && { relatedFile: relatedFileOf(firstError) }),
      }
    );
  }

  // ==========================================================================
  // Availability
  // ==========================================================================

  get unavailable(): readonly UnavailableTable[] {
    return [...this.unavailableTables.values()];
  }

  /**
   * Whether every given table can be relied on
   */
  isAvailable(...tables: readonly TableName[]): boolean {
    return tables.every(table => !this.unavailableTables.has(table));
  }

  /**
   * Whether a table decoded (possibly empty)
   */
  isLoaded(table: TableName): boolean {
    return this.raw.tables[table].status === 'loaded';
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  /**
   * Stop times of a trip, ordered by stop_sequence
   */
  stopTimesOf(tripId: string): readonly StopTime[] {
    return this.tripStopTimes.get(tripId) ?? [];
  }

  tripsOfRoute(routeId: string): readonly Trip[] {
    return this.routeTrips.get(routeId) ?? [];
  }

  parentOf(stop: Stop): Stop | undefined {
    return stop.parentStation === undefined ? undefined : this.stops.get(stop.parentStation);
  }

  shapeOf(trip: Trip): Shape | undefined {
    return trip.shapeId === undefined ? undefined : this.shapes.get(trip.shapeId);
  }

  routeOf(trip: Trip): Route | undefined {
    return this.routes.get(trip.routeId);
  }

  fareRulesOf(fareId: string): readonly FareRule[] {
    return this.fareRulesByFare.get(fareId) ?? [];
  }

  fareAttributeOf(rule: FareRule): FareAttribute | undefined {
    return this.fareAttributes.get(rule.fareId);
  }

  /**
   * Agency a route belongs to; routes may omit agency_id in single-agency feeds
   */
  agencyOf(route: Route): Agency | undefined {
    if (route.agencyId === undefined) {
      return this.agencies.length === 1 ? this.agencies[0] : undefined;
    }
    return this.agencies.find(agency => agency.id === route.agencyId);
  }
}
