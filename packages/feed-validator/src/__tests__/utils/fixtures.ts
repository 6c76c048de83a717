/**
 * Test Fixture Factories
 *
 * Builders for in-memory feeds. Each record factory fills the required
 * fields with defaults; `buildRawFeed` marks every table it is given as
 * loaded and every other table as missing.
 *
 * The default coordinates sit in central Paris. Zero coordinates count as
 * missing, so fixtures never use them.
 */

import {
  tableFileName,
  TABLE_NAMES,
  type Agency,
  type Calendar,
  type CalendarDate,
  type RawFeed,
  type RawTable,
  type Route,
  type ShapePoint,
  type Stop,
  type StopTime,
  type TableLoadError,
  type TableName,
  type TableRecords,
  type Trip,
} from '../../core/types/feed.js';

// ============================================================================
// Record Factories
// ============================================================================

export const BASE_LAT = 48.8566;
export const BASE_LON = 2.3522;

export function createAgency(overrides: Partial<Agency> = {}): Agency {
  return {
    id: 'AG',
    name: 'City Transit',
    url: 'https://transit.example.org',
    timezone: 'Europe/Paris',
    lang: 'fr',
    ...overrides,
  };
}

export function createStop(id: string, overrides: Partial<Stop> = {}): Stop {
  return {
    id,
    name: `Stop ${id}`,
    latitude: BASE_LAT,
    longitude: BASE_LON,
    locationType: 'stop-point',
    wheelchairBoarding: 'unknown',
    ...overrides,
  };
}

export function createRoute(id: string, overrides: Partial<Route> = {}): Route {
  return {
    id,
    agencyId: 'AG',
    shortName: id,
    longName: `Line ${id}`,
    routeType: 3,
    ...overrides,
  };
}

export function createTrip(id: string, overrides: Partial<Trip> = {}): Trip {
  return {
    id,
    routeId: 'R1',
    serviceId: 'WEEK',
    wheelchairAccessible: 'unknown',
    bikesAllowed: 'no-info',
    ...overrides,
  };
}

export function createStopTime(
  tripId: string,
  stopId: string,
  stopSequence: number,
  overrides: Partial<StopTime> = {}
): StopTime {
  return {
    tripId,
    stopId,
    stopSequence,
    pickupType: 'regular',
    dropOffType: 'regular',
    ...overrides,
  };
}

/**
 * Stop time with the same arrival and departure time
 */
export function timedStopTime(
  tripId: string,
  stopId: string,
  stopSequence: number,
  seconds: number
): StopTime {
  return createStopTime(tripId, stopId, stopSequence, {
    arrivalTime: seconds,
    departureTime: seconds,
  });
}

export function createCalendar(id: string, overrides: Partial<Calendar> = {}): Calendar {
  return {
    id,
    monday: true,
    tuesday: true,
    wednesday: true,
    thursday: true,
    friday: true,
    saturday: false,
    sunday: false,
    startDate: '20240101',
    endDate: '20241231',
    ...overrides,
  };
}

export function createCalendarDate(
  serviceId: string,
  date: string,
  exceptionType: CalendarDate['exceptionType'] = 'added'
): CalendarDate {
  return { serviceId, date, exceptionType };
}

export function createShapePoint(
  id: string,
  sequence: number,
  latitude: number,
  longitude: number,
  overrides: Partial<ShapePoint> = {}
): ShapePoint {
  return { id, sequence, latitude, longitude, ...overrides };
}

/**
 * Seconds after midnight for a HH:MM clock time
 */
export function clock(hours: number, minutes: number, seconds = 0): number {
  return hours * 3600 + minutes * 60 + seconds;
}

// ============================================================================
// Feed Builder
// ============================================================================

export type FeedTables = {
  readonly [K in TableName]?: readonly TableRecords[K][];
};

export interface FeedFixture extends FeedTables {
  /** Archive paths; defaults to the file of every given table */
  readonly files?: readonly string[];
  /** Tables that failed to decode */
  readonly failed?: Partial<Readonly<Record<TableName, TableLoadError>>>;
}

function tableOf<K extends TableName>(
  tables: FeedTables,
  failed: FeedFixture['failed'],
  table: K
): RawTable<TableRecords[K]> {
  const error = failed?.[table];
  if (error !== undefined) {
    return { status: 'failed', error };
  }
  const records: readonly TableRecords[K][] | undefined = tables[table];
  return records === undefined ? { status: 'missing' } : { status: 'loaded', records };
}

export function buildRawFeed(fixture: FeedFixture): RawFeed {
  const files =
    fixture.files ??
    TABLE_NAMES.filter(table => fixture[table] !== undefined || fixture.failed?.[table] !== undefined).map(
      tableFileName
    );

  return {
    files,
    tables: {
      agency: tableOf(fixture, fixture.failed, 'agency'),
      stops: tableOf(fixture, fixture.failed, 'stops'),
      routes: tableOf(fixture, fixture.failed, 'routes'),
      trips: tableOf(fixture, fixture.failed, 'trips'),
      stop_times: tableOf(fixture, fixture.failed, 'stop_times'),
      calendar: tableOf(fixture, fixture.failed, 'calendar'),
      calendar_dates: tableOf(fixture, fixture.failed, 'calendar_dates'),
      shapes: tableOf(fixture, fixture.failed, 'shapes'),
      fare_attributes: tableOf(fixture, fixture.failed, 'fare_attributes'),
      fare_rules: tableOf(fixture, fixture.failed, 'fare_rules'),
      feed_info: tableOf(fixture, fixture.failed, 'feed_info'),
      pathways: tableOf(fixture, fixture.failed, 'pathways'),
    },
  };
}

/**
 * A feed that passes every check: one bus line with two stops about 732 m
 * apart, served in two minutes, following its shape
 */
export function cleanFeedFixture(): FeedFixture {
  const east = BASE_LON + 0.01;
  return {
    agency: [createAgency()],
    stops: [
      createStop('S1', { name: 'Gare Centrale' }),
      createStop('S2', { name: 'Place du Marche', longitude: east }),
    ],
    routes: [createRoute('R1')],
    trips: [createTrip('T1', { shapeId: 'SH1' })],
    stop_times: [timedStopTime('T1', 'S1', 1, clock(8, 0)), timedStopTime('T1', 'S2', 2, clock(8, 2))],
    calendar: [createCalendar('WEEK')],
    shapes: [createShapePoint('SH1', 1, BASE_LAT, BASE_LON), createShapePoint('SH1', 2, BASE_LAT, east)],
  };
}
