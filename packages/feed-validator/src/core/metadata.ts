/**
 * Metadata Summarizer
 *
 * Aggregate figures about a feed, computed from the model index and the
 * true (uncapped) issue counts. Pure: the same index and counts always give
 * the same metadata.
 */

import { standardModeOf, type TransportMode } from '../config/rules.js';
import type { ModelIndex } from './model-index.js';
import { recordsOf, type StopTime, type Trip, type PickupDropOffType } from './types/feed.js';

export const VALIDATOR_VERSION = '0.3.0';

// ============================================================================
// Types
// ============================================================================

export interface DateRange {
  readonly start: string;
  readonly end: string;
}

export interface Metadata {
  readonly startDate: string | null;
  readonly endDate: string | null;
  readonly stopsCount: number;
  readonly stopAreasCount: number;
  readonly stopPointsCount: number;
  /** Null when stops could not be linked */
  readonly stopsWithWheelchairInfoCount: number | null;
  readonly linesCount: number;
  readonly tripsCount: number;
  readonly tripsWithBikeInfoCount: number;
  readonly tripsWithWheelchairInfoCount: number;
  readonly networks: readonly string[];
  /** Agency name to service period; null when routes or trips could not be linked */
  readonly networksStartEndDates: Readonly<Record<string, DateRange | null>> | null;
  readonly modes: readonly TransportMode[];
  readonly issuesCount: Readonly<Record<string, number>>;
  readonly hasFares: boolean;
  readonly hasShapes: boolean;
  readonly hasPathways: boolean;
  readonly linesWithCustomColorCount: number;
  readonly someStopsNeedPhoneAgency: boolean;
  readonly someStopsNeedPhoneDriver: boolean;
  readonly validatorVersion: string;
}

const DEFAULT_ROUTE_COLOR = 'FFFFFF';
const DEFAULT_TEXT_COLOR = '000000';

// ============================================================================
// Helpers
// ============================================================================

/**
 * YYYYMMDD → YYYY-MM-DD
 */
export function formatFeedDate(date: string): string {
  return `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}`;
}

function rangeOf(dates: Iterable<string>): DateRange | null {
  let start: string | undefined;
  let end: string | undefined;
  for (const date of dates) {
    if (start === undefined || date < start) start = date;
    if (end === undefined || date > end) end = date;
  }
  return start === undefined || end === undefined
    ? null
    : { start: formatFeedDate(start), end: formatFeedDate(end) };
}

function* serviceDates(index: ModelIndex, serviceId: string): Generator<string> {
  const calendar = index.calendars.get(serviceId);
  if (calendar !== undefined) {
    yield calendar.startDate;
    yield calendar.endDate;
  }
  for (const date of index.calendarDates.get(serviceId) ?? []) {
    if (date.exceptionType === 'added') {
      yield date.date;
    }
  }
}

function* feedDates(index: ModelIndex): Generator<string> {
  for (const calendar of recordsOf(index.raw.tables.calendar)) {
    yield calendar.startDate;
    yield calendar.endDate;
  }
  for (const date of recordsOf(index.raw.tables.calendar_dates)) {
    if (date.exceptionType === 'added') {
      yield date.date;
    }
  }
}

function networksStartEndDates(index: ModelIndex): Record<string, DateRange | null> {
  const result: Record<string, DateRange | null> = {};

  for (const agency of index.agencies) {
    const trips: Trip[] = [];
    for (const route of index.routes.values()) {
      if (index.agencyOf(route) === agency) {
        trips.push(...index.tripsOfRoute(route.id));
      }
    }
    result[agency.name] = rangeOf(trips.flatMap(trip => [...serviceDates(index, trip.serviceId)]));
  }

  return result;
}

function needsPhone(stopTime: StopTime, type: PickupDropOffType): boolean {
  return (
    stopTime.pickupType === type ||
    stopTime.dropOffType === type ||
    stopTime.continuousPickup === type ||
    stopTime.continuousDropOff === type
  );
}

function countWhere<T>(items: Iterable<T>, predicate: (item: T) => boolean): number {
  let count = 0;
  for (const item of items) {
    if (predicate(item)) count++;
  }
  return count;
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Summarize a feed
 *
 * @param index - Model index of the feed
 * @param issuesCount - True issue counts per kind
 */
export function summarizeMetadata(
  index: ModelIndex,
  issuesCount: Readonly<Record<string, number>>
): Metadata {
  const stops = recordsOf(index.raw.tables.stops);
  const routes = recordsOf(index.raw.tables.routes);
  const trips = recordsOf(index.raw.tables.trips);
  const stopTimes = recordsOf(index.raw.tables.stop_times);
  const feedRange = rangeOf(feedDates(index));

  const modes: TransportMode[] = [];
  for (const route of routes) {
    const mode = standardModeOf(route.routeType);
    if (mode !== undefined && !modes.includes(mode)) {
      modes.push(mode);
    }
  }

  return {
    startDate: feedRange?.start ?? null,
    endDate: feedRange?.end ?? null,
    stopsCount: stops.length,
    stopAreasCount: countWhere(stops, stop => stop.locationType === 'stop-area'),
    stopPointsCount: countWhere(stops, stop => stop.locationType === 'stop-point'),
    stopsWithWheelchairInfoCount: index.isAvailable('stops')
      ? countWhere(index.stops.values(), stop => {
          if (stop.wheelchairBoarding !== 'unknown') return true;
          const parent = index.parentOf(stop);
          return parent !== undefined && parent.wheelchairBoarding !== 'unknown';
        })
      : null,
    linesCount: routes.length,
    tripsCount: trips.length,
    tripsWithBikeInfoCount: countWhere(trips, trip => trip.bikesAllowed !== 'no-info'),
    tripsWithWheelchairInfoCount: countWhere(trips, trip => trip.wheelchairAccessible !== 'unknown'),
    networks: [...new Set(index.agencies.map(agency => agency.name))],
    networksStartEndDates: index.isAvailable('routes', 'trips') ? networksStartEndDates(index) : null,
    modes,
    issuesCount: { ...issuesCount },
    hasFares: recordsOf(index.raw.tables.fare_attributes).length > 0,
    hasShapes: recordsOf(index.raw.tables.shapes).length > 0,
    hasPathways: recordsOf(index.raw.tables.pathways).length > 0,
    linesWithCustomColorCount: countWhere(
      routes,
      route =>
        (route.color ?? DEFAULT_ROUTE_COLOR).toUpperCase() !== DEFAULT_ROUTE_COLOR ||
        (route.textColor ?? DEFAULT_TEXT_COLOR).toUpperCase() !== DEFAULT_TEXT_COLOR
    ),
    someStopsNeedPhoneAgency: stopTimes.some(st => needsPhone(st, 'arrange-by-phone')),
    someStopsNeedPhoneDriver: stopTimes.some(st => needsPhone(st, 'coordinate-with-driver')),
    validatorVersion: VALIDATOR_VERSION,
  };
}
